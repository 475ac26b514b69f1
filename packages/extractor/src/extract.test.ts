/**
 * Tests for the source extractor
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ClassificationEngine,
  DeclarationGraph,
  TypeSymbol,
  createDeclarationGraph,
  createOpaque,
  formatRef,
} from "@lineage/engine";
import { extractDeclarations, extractFromFiles } from "./extract.js";
import type { Extraction } from "./types.js";

const lines = (...source: string[]): string => source.join("\n");

const describeSymbols = (symbols: readonly TypeSymbol[]): string[] =>
  symbols.map((symbol) => `${symbol.kind} ${symbol.module}.${symbol.name}`);

const find = (extraction: Extraction, name: string): TypeSymbol => {
  const symbol = extraction.symbols.find((s) => s.name === name);
  if (!symbol) {
    throw new Error(`no symbol ${name}`);
  }
  return symbol;
};

const graphOf = (extraction: Extraction): DeclarationGraph => {
  const graph = createDeclarationGraph(extraction.symbols);
  if (!graph.ok) {
    throw new Error(`graph failed with ${graph.error.length} errors`);
  }
  return graph.value;
};

describe("extractDeclarations", () => {
  it("should extract a superclass reached through an alias", () => {
    const extraction = extractDeclarations([
      {
        fileName: "controllers.ts",
        content: lines(
          `import { UIViewController } from "UIKit";`,
          ``,
          `type BaseController = UIViewController;`,
          ``,
          `export class AliasedInheritanceController extends BaseController {}`
        ),
      },
    ]);

    expect(describeSymbols(extraction.symbols)).to.deep.equal([
      "alias local.BaseController",
      "class local.AliasedInheritanceController",
      "opaque UIKit.UIViewController",
    ]);

    const engine = new ClassificationEngine(graphOf(extraction));
    const type = engine.resolveType(find(extraction, "AliasedInheritanceController"));
    expect(type.ok).to.equal(true);
    if (type.ok) {
      expect(type.value.canonicalSuperclassChain.map(formatRef)).to.deep.equal([
        "UIKit.UIViewController",
      ]);
      expect(type.value.terminatedAtOpaque).to.equal(true);
    }
  });

  it("should turn an intersection alias into a composition", () => {
    const extraction = extractDeclarations([
      {
        fileName: "events.ts",
        content: lines(
          `import { Codable } from "Swift";`,
          `interface Trackable {}`,
          `type Serializable = Codable;`,
          `type AnalyticsEvent = Serializable & Trackable;`,
          `class UserLoginEvent implements AnalyticsEvent {}`
        ),
      },
    ]);

    const event = find(extraction, "AnalyticsEvent");
    expect(event.kind).to.equal("alias");
    if (event.kind === "alias") {
      expect(event.aliasTarget).to.deep.equal({
        kind: "composition",
        members: [
          { module: "local", name: "Serializable" },
          { module: "local", name: "Trackable" },
        ],
      });
    }

    const engine = new ClassificationEngine(graphOf(extraction));
    const login = find(extraction, "UserLoginEvent");
    expect(engine.conformsTo(login, find(extraction, "Trackable"))).to.deep.equal({
      ok: true,
      value: true,
    });
    expect(engine.conformsTo(login, find(extraction, "Codable"))).to.deep.equal({
      ok: true,
      value: true,
    });
  });

  it("should leave ancestry past an imported base unknown", () => {
    const extraction = extractDeclarations([
      {
        fileName: "views.ts",
        content: lines(
          `import { BaseView } from "ExternalFramework";`,
          `class MyCustomView extends BaseView {}`
        ),
      },
    ]);

    expect(describeSymbols(extraction.symbols)).to.deep.equal([
      "class local.MyCustomView",
      "opaque ExternalFramework.BaseView",
    ]);

    const engine = new ClassificationEngine(graphOf(extraction));
    const view = find(extraction, "MyCustomView");
    expect(engine.isDescendantOf(view, find(extraction, "BaseView"))).to.deep.equal({
      ok: true,
      value: "unknown",
    });
    expect(
      engine.isDescendantOf(view, createOpaque("UIView", "UIKit"))
    ).to.deep.equal({ ok: true, value: "unknown" });
  });

  it("should record dynamic bindings with their sites", () => {
    const extraction = extractDeclarations(
      [
        {
          fileName: "screens.ts",
          content: lines(
            `import { UIViewController } from "UIKit";`,
            `export class ProfileScreen extends UIViewController {}`,
            `const route = { screen_name: "ProfileScreen", title: "Profile" };`,
            `const screen_name = lookup();`,
            `const fallback = { screen_name };`,
            `config["screen_name"] = "SettingsScreen";`
          ),
        },
      ],
      { dynamicKeys: ["screen_name"] }
    );

    expect(extraction.bindings).to.deep.equal([
      { key: "screen_name", literalValue: "ProfileScreen", siteId: "screens.ts:3:17" },
      { key: "screen_name", siteId: "screens.ts:5:20" },
      { key: "screen_name", literalValue: "SettingsScreen", siteId: "screens.ts:6:1" },
    ]);
  });

  it("should record every key without a filter", () => {
    const extraction = extractDeclarations([
      {
        fileName: "route.ts",
        content: `const route = { screen_name: "ProfileScreen", title: "Profile" };`,
      },
    ]);

    expect(extraction.bindings.map((b) => b.key)).to.deep.equal([
      "screen_name",
      "title",
    ]);
    expect(extraction.bindings[1]?.siteId).to.equal("route.ts:1:47");
  });

  it("should resolve namespace imports and ambient names", () => {
    const extraction = extractDeclarations([
      {
        fileName: "screens.ts",
        content: lines(
          `import * as UIKit from "UIKit";`,
          `class Screen extends UIKit.UIViewController {}`,
          `class Failure extends Error {}`,
          `class Widget extends React.Component {}`
        ),
      },
    ]);

    expect(describeSymbols(extraction.symbols)).to.deep.equal([
      "class local.Screen",
      "class local.Failure",
      "class local.Widget",
      "opaque UIKit.UIViewController",
      "opaque ambient.Error",
      "opaque ambient.React.Component",
    ]);
  });

  it("should follow renamed and relative imports", () => {
    const extraction = extractDeclarations([
      { fileName: "base.ts", content: `export class Base {}` },
      {
        fileName: "screen.ts",
        content: lines(
          `import { Base as Root } from "./base.js";`,
          `import { UIView as View } from "UIKit";`,
          `class Screen extends Root {}`,
          `class Banner extends View {}`
        ),
      },
    ]);

    const screen = find(extraction, "Screen");
    const banner = find(extraction, "Banner");
    expect(screen.kind === "class" && screen.declaredSuperclass).to.deep.equal({
      module: "local",
      name: "Base",
    });
    expect(banner.kind === "class" && banner.declaredSuperclass).to.deep.equal({
      module: "UIKit",
      name: "UIView",
    });
  });

  it("should merge repeated interface declarations", () => {
    const extraction = extractDeclarations([
      {
        fileName: "protocols.ts",
        content: lines(
          `interface Trackable extends Named {}`,
          `interface Trackable extends Timestamped, Named {}`,
          `interface Named {}`,
          `interface Timestamped {}`
        ),
      },
    ]);

    expect(describeSymbols(extraction.symbols)).to.deep.equal([
      "protocol local.Trackable",
      "protocol local.Named",
      "protocol local.Timestamped",
    ]);
    const trackable = find(extraction, "Trackable");
    expect(trackable.kind === "protocol" && trackable.declaredProtocols).to.deep.equal([
      { module: "local", name: "Named" },
      { module: "local", name: "Timestamped" },
    ]);
  });

  it("should warn about heritage that is not a type reference", () => {
    const extraction = extractDeclarations([
      {
        fileName: "mixins.ts",
        content: lines(`class Base {}`, `class Mixed extends mixin(Base) {}`),
      },
    ]);

    expect(extraction.diagnostics).to.have.length(1);
    const [warning] = extraction.diagnostics;
    expect(warning?.code).to.equal("LIN3001");
    expect(warning?.severity).to.equal("warning");
    expect(warning?.message).to.equal(
      "Heritage clause 'mixin(Base)' is not a type reference"
    );
    expect(warning?.location).to.deep.equal({
      file: "mixins.ts",
      line: 2,
      column: 21,
      length: 11,
    });
    expect(describeSymbols(extraction.symbols)).to.deep.equal([
      "class local.Base",
      "class local.Mixed",
      "opaque ambient.mixin(Base)",
    ]);
  });

  it("should skip aliases that are not references", () => {
    const extraction = extractDeclarations([
      {
        fileName: "types.ts",
        content: lines(
          `type Id = string;`,
          `type Same<T> = T;`,
          `type Box = { value: number };`,
          `type Either = Left | Right;`
        ),
      },
    ]);

    expect(extraction.symbols).to.deep.equal([]);
  });

  it("should use the configured local module", () => {
    const extraction = extractDeclarations(
      [{ fileName: "a.ts", content: `class A {}` }],
      { localModule: "App" }
    );
    expect(describeSymbols(extraction.symbols)).to.deep.equal(["class App.A"]);
  });
});

describe("extractFromFiles", () => {
  it("should read sources from disk", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "lineage-test-"));
    const file = path.join(tmpDir, "views.ts");
    fs.writeFileSync(file, `class MyCustomView extends BaseView {}\n`);

    const result = extractFromFiles([file]);
    fs.rmSync(tmpDir, { recursive: true, force: true });

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(describeSymbols(result.value.symbols)).to.deep.equal([
        "class local.MyCustomView",
        "opaque ambient.BaseView",
      ]);
      expect(result.value.symbols[0]?.location?.file).to.equal(file);
    }
  });

  it("should report missing files", () => {
    const result = extractFromFiles(["/nonexistent/views.ts"]);
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.map((d) => d.code)).to.deep.equal(["LIN3002"]);
    }
  });
});
