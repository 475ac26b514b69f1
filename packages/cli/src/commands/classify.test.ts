/**
 * Tests for the classify command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { resolveConfig } from "../config.js";
import {
  createProject,
  fixtureConfig,
  scenarioDir,
  sourcesDir,
} from "../testing/fixtures.js";
import { classifyCommand } from "./classify.js";

describe("classify command", () => {
  it("should print findings and evidence for a graph file", () => {
    const result = classifyCommand(fixtureConfig(scenarioDir));

    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    expect(result.value.exitCode).to.equal(0);
    expect(result.value.output).to.deep.equal([
      "local.AliasedInheritanceController",
      "  screen (view-controller): possible",
      "    superclass chain: local.AliasedInheritanceController → UIKit.UIViewController",
      "    ancestry of UIKit.UIViewController is unknown",
      "  analytics (trackable): possible",
      "    effective protocols: (none)",
      "    conformance to local.Trackable may come from UIKit.UIViewController",
      "local.UserLoginEvent",
      "  analytics (trackable): match",
      "    effective protocols: Swift.Codable, local.Trackable",
      "local.ProfileScreen",
      "  screen (view-controller): possible",
      "    superclass chain: local.ProfileScreen → UIKit.UIViewController",
      "    ancestry of UIKit.UIViewController is unknown",
      "  analytics (trackable): possible",
      "    effective protocols: (none)",
      "    conformance to local.Trackable may come from UIKit.UIViewController",
      "  routed (dynamic-screen): match",
      '    screen_name = "ProfileScreen" at router.ts:12:5',
      "Unresolved dynamic references:",
      "  screen_name at router.ts:20:5: not a static literal",
      "3 of 3 classes classified",
    ]);
    expect(result.value.diagnostics.map((d) => d.code)).to.deep.equal(["LIN2001"]);
  });

  it("should drop the summary when quiet", () => {
    const result = classifyCommand(fixtureConfig(scenarioDir, { quiet: true }));

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.output.at(-1)).to.equal(
        "  screen_name at router.ts:20:5: not a static literal"
      );
    }
  });

  it("should classify TypeScript sources as JSON", () => {
    const result = classifyCommand(fixtureConfig(sourcesDir, { json: true }));

    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    expect(result.value.exitCode).to.equal(0);
    expect(result.value.diagnostics).to.deep.equal([]);

    const report = JSON.parse(result.value.output.join("\n"));
    expect(
      report.classifications.map(
        (entry: { symbol: string; findings: { ruleId: string; verdict: string }[] }) =>
          `${entry.symbol}: ${entry.findings.map((f) => `${f.ruleId}=${f.verdict}`).join(" ")}`
      )
    ).to.deep.equal([
      "local.UserLoginEvent: trackable=match",
      "local.AliasedInheritanceController: view-controller=possible trackable=possible",
      "local.ProfileScreen: view-controller=possible trackable=possible dynamic-screen=match",
      "local.MyCustomView: view-controller=possible trackable=possible",
    ]);
    expect(report.unresolvedSites).to.deep.equal([
      {
        key: "screen_name",
        literalValue: "MissingScreen",
        siteId: "src/router.ts:3:5",
        resolution: { kind: "unresolvable", reason: "no-match" },
      },
      {
        key: "screen_name",
        siteId: "src/router.ts:6:49",
        resolution: { kind: "unresolvable", reason: "not-literal" },
      },
    ]);
    expect(report.diagnostics).to.deep.equal([
      {
        code: "LIN2001",
        severity: "info",
        message:
          "screen_name at src/router.ts:3:5 cannot be resolved: no declared class has this name",
      },
      {
        code: "LIN2001",
        severity: "info",
        message:
          "screen_name at src/router.ts:6:49 cannot be resolved: the value is not a static literal",
      },
    ]);
  });

  it("should explain an unknown ancestry from sources", () => {
    const result = classifyCommand(fixtureConfig(sourcesDir));

    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    const start = result.value.output.indexOf("local.MyCustomView");
    expect(result.value.output.slice(start, start + 7)).to.deep.equal([
      "local.MyCustomView",
      "  screen (view-controller): possible",
      "    superclass chain: local.MyCustomView → ExternalFramework.BaseView",
      "    ancestry of ExternalFramework.BaseView is unknown",
      "  analytics (trackable): possible",
      "    effective protocols: (none)",
      "    conformance to local.Trackable may come from ExternalFramework.BaseView",
    ]);
  });

  it("should exit with 2 on an inheritance cycle", () => {
    const project = createProject({
      "graph.json": JSON.stringify({
        symbols: [
          { kind: "class", name: "A", superclass: { name: "B" } },
          { kind: "class", name: "B", superclass: { name: "A" } },
        ],
      }),
    });
    const config = resolveConfig(
      {
        inputs: ["graph.json"],
        rules: [
          {
            id: "view-controller",
            category: "screen",
            when: {
              kind: "descendsFrom",
              base: { module: "UIKit", name: "UIViewController" },
            },
          },
        ],
      },
      {},
      project.root
    );

    const result = classifyCommand(config);
    project.cleanup();

    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    expect(result.value.exitCode).to.equal(2);
    expect(result.value.output).to.deep.equal(["0 of 2 classes classified"]);
    expect(result.value.diagnostics.length).to.be.greaterThan(0);
    expect(result.value.diagnostics.every((d) => d.code === "LIN1003")).to.equal(true);
  });

  it("should fail on unsupported inputs", () => {
    const project = createProject({ "notes.txt": "UIViewController" });
    const config = resolveConfig({ inputs: ["notes.txt"] }, {}, project.root);

    const result = classifyCommand(config);
    project.cleanup();

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.map((d) => d.code)).to.deep.equal(["LIN3004"]);
    }
  });
});
