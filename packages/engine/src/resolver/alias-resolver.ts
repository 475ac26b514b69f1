/**
 * Alias resolution
 *
 * Expands alias indirection to the declaration(s) an alias finally stands for.
 * Composition aliases are flattened in first-seen order.
 */

import type { DeclarationGraph } from "../graph/declaration-graph.js";
import {
  ConcreteSymbol,
  TypeSymbol,
  sameSymbol,
  symbolKey,
} from "../types/symbol.js";
import { EngineError, cyclicAlias } from "../types/errors.js";
import { Result, ok, error } from "../types/result.js";

export type SingleTarget = {
  readonly kind: "single";
  readonly symbol: ConcreteSymbol;
};

export type CompositionTarget = {
  readonly kind: "composition";
  readonly members: readonly ConcreteSymbol[];
};

export type AliasResolution = SingleTarget | CompositionTarget;

export const single = (symbol: ConcreteSymbol): SingleTarget => ({
  kind: "single",
  symbol,
});

/**
 * Every symbol a resolution stands for
 */
export const targetsOf = (
  resolution: AliasResolution
): readonly ConcreteSymbol[] =>
  resolution.kind === "single" ? [resolution.symbol] : resolution.members;

/**
 * Resolve `symbol` to its canonical target. Non-aliases resolve to themselves.
 */
export const resolveAlias = (
  graph: DeclarationGraph,
  symbol: TypeSymbol
): Result<AliasResolution, EngineError> => resolveOnPath(graph, symbol, []);

/**
 * Resolve an existing resolution again. Resolutions hold no aliases, so the
 * result equals the input.
 */
export const normalizeResolution = (
  graph: DeclarationGraph,
  resolution: AliasResolution
): Result<AliasResolution, EngineError> => {
  if (resolution.kind === "single") {
    return resolveAlias(graph, resolution.symbol);
  }

  const members: ConcreteSymbol[] = [];
  for (const member of resolution.members) {
    const resolved = resolveAlias(graph, member);
    if (!resolved.ok) {
      return resolved;
    }
    appendUnique(members, targetsOf(resolved.value));
  }
  return ok({ kind: "composition", members });
};

const resolveOnPath = (
  graph: DeclarationGraph,
  symbol: TypeSymbol,
  path: readonly TypeSymbol[]
): Result<AliasResolution, EngineError> => {
  if (symbol.kind !== "alias") {
    return ok(single(symbol));
  }

  const seenAt = path.findIndex((entry) => sameSymbol(entry, symbol));
  if (seenAt >= 0) {
    return error(cyclicAlias([...path.slice(seenAt), symbol]));
  }

  const nextPath = [...path, symbol];
  const target = symbol.aliasTarget;

  if (target.kind === "single") {
    const next = graph.resolveReference(target.target, symbol);
    if (!next.ok) {
      return next;
    }
    return resolveOnPath(graph, next.value, nextPath);
  }

  const members: ConcreteSymbol[] = [];
  for (const ref of target.members) {
    const member = graph.resolveReference(ref, symbol);
    if (!member.ok) {
      return member;
    }
    const resolved = resolveOnPath(graph, member.value, nextPath);
    if (!resolved.ok) {
      return resolved;
    }
    appendUnique(members, targetsOf(resolved.value));
  }

  return ok({ kind: "composition", members });
};

const appendUnique = (
  into: ConcreteSymbol[],
  symbols: readonly ConcreteSymbol[]
): void => {
  const seen = new Set(into.map(symbolKey));
  for (const symbol of symbols) {
    const key = symbolKey(symbol);
    if (!seen.has(key)) {
      seen.add(key);
      into.push(symbol);
    }
  }
};
