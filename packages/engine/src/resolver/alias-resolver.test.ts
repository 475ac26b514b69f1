/**
 * Tests for alias resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  AliasResolution,
  normalizeResolution,
  resolveAlias,
  targetsOf,
} from "./alias-resolver.js";
import { DeclarationGraph } from "../graph/declaration-graph.js";
import {
  TypeSymbol,
  createAlias,
  createClass,
  createOpaque,
  createProtocol,
  formatRef,
} from "../types/symbol.js";
import type { Result } from "../types/result.js";
import type { EngineError } from "../types/errors.js";
import {
  buildGraph,
  local,
  scenarioGraph,
  symbolOf,
  uikit,
} from "../testing/fixture-graph.js";

const names = (result: Result<AliasResolution, EngineError>): string[] => {
  if (!result.ok) {
    throw new Error(`unexpected ${result.error.kind}`);
  }
  return targetsOf(result.value).map(formatRef);
};

describe("Alias Resolver", () => {
  it("should resolve a non-alias to itself", () => {
    const graph = scenarioGraph();
    const result = resolveAlias(graph, symbolOf(graph, local("Trackable")));

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.kind).to.equal("single");
    }
    expect(names(result)).to.deep.equal(["local.Trackable"]);
  });

  it("should resolve an alias to its opaque target", () => {
    const graph = scenarioGraph();
    const result = resolveAlias(graph, symbolOf(graph, local("BaseController")));

    expect(names(result)).to.deep.equal(["UIKit.UIViewController"]);
    if (result.ok && result.value.kind === "single") {
      expect(result.value.symbol.kind).to.equal("opaque");
    }
  });

  it("should flatten a composition whose members are aliases", () => {
    const graph = scenarioGraph();
    const result = resolveAlias(graph, symbolOf(graph, local("AnalyticsEvent")));

    expect(result.ok && result.value.kind).to.equal("composition");
    expect(names(result)).to.deep.equal(["Swift.Codable", "local.Trackable"]);
  });

  it("should expand nested compositions in place without duplicates", () => {
    const graph = buildGraph([
      createProtocol("A"),
      createProtocol("B"),
      createProtocol("C"),
      createAlias("AB", [local("A"), local("B")]),
      createAlias("BC", [local("B"), local("C")]),
      createAlias("All", [local("AB"), local("BC"), local("A")]),
    ]);

    const result = resolveAlias(graph, symbolOf(graph, local("All")));

    expect(names(result)).to.deep.equal(["local.A", "local.B", "local.C"]);
  });

  it("should resolve a chain of aliases of any depth", () => {
    const symbols: TypeSymbol[] = [createOpaque("UIViewController", "UIKit")];
    let previous = uikit("UIViewController");
    for (let i = 0; i < 25; i++) {
      symbols.push(createAlias(`Step${i}`, previous));
      previous = local(`Step${i}`);
    }
    const graph = buildGraph(symbols);

    const result = resolveAlias(graph, symbolOf(graph, local("Step24")));

    expect(names(result)).to.deep.equal(["UIKit.UIViewController"]);
  });

  it("should not treat a diamond as a cycle", () => {
    const graph = buildGraph([
      createProtocol("Base"),
      createAlias("Left", local("Base")),
      createAlias("Right", local("Base")),
      createAlias("Both", [local("Left"), local("Right")]),
    ]);

    const result = resolveAlias(graph, symbolOf(graph, local("Both")));

    expect(names(result)).to.deep.equal(["local.Base"]);
  });

  it("should fail on a two-alias cycle naming both symbols", () => {
    const graph = buildGraph([
      createAlias("A", local("B")),
      createAlias("B", local("A")),
    ]);

    const result = resolveAlias(graph, symbolOf(graph, local("A")));

    expect(result.ok).to.equal(false);
    if (!result.ok && result.error.kind === "cyclicAlias") {
      expect(result.error.cycle.map(formatRef)).to.deep.equal([
        "local.A",
        "local.B",
        "local.A",
      ]);
    } else {
      expect.fail("expected a cyclic alias error");
    }
  });

  it("should detect a cycle through a composition member", () => {
    const graph = buildGraph([
      createProtocol("P"),
      createAlias("Outer", [local("P"), local("Inner")]),
      createAlias("Inner", local("Outer")),
    ]);

    const result = resolveAlias(graph, symbolOf(graph, local("Inner")));

    expect(result.ok).to.equal(false);
    if (!result.ok && result.error.kind === "cyclicAlias") {
      expect(result.error.cycle.map(formatRef)).to.deep.equal([
        "local.Inner",
        "local.Outer",
        "local.Inner",
      ]);
    } else {
      expect.fail("expected a cyclic alias error");
    }
  });

  it("should fail on an alias to an undeclared local symbol", () => {
    const graph = buildGraph([createAlias("Dangling", local("Nowhere"))]);

    const result = resolveAlias(graph, symbolOf(graph, local("Dangling")));

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.kind).to.equal("unresolvedReference");
    }
  });

  describe("normalizeResolution", () => {
    it("should return a single target unchanged", () => {
      const graph = new DeclarationGraph();
      graph.addSymbol(createClass("Screen"));
      const first = resolveAlias(graph, symbolOf(graph, local("Screen")));
      if (!first.ok) {
        expect.fail(first.error.kind);
      }

      const again = normalizeResolution(graph, first.value);

      expect(again).to.deep.equal(first);
    });

    it("should return a composition target unchanged", () => {
      const graph = scenarioGraph();
      const first = resolveAlias(graph, symbolOf(graph, local("AnalyticsEvent")));
      if (!first.ok) {
        expect.fail(first.error.kind);
      }

      const again = normalizeResolution(graph, first.value);

      expect(again).to.deep.equal(first);
    });
  });
});
