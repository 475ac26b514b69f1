/**
 * Dynamic reference resolution
 *
 * A class picked at runtime by a string name is resolved only when the
 * string was observed as a literal. Anything else is reported as unresolvable.
 */

import { compareModules } from "../graph/declaration-graph.js";
import type { DeclarationGraph } from "../graph/declaration-graph.js";
import type {
  ClassSymbol,
  DynamicBinding,
  TypeSymbol,
} from "../types/symbol.js";

export type UnresolvableReason = "not-literal" | "no-match";

export type DynamicResolution =
  | { readonly kind: "resolved"; readonly symbol: ClassSymbol }
  | {
      readonly kind: "ambiguous";
      readonly candidates: readonly ClassSymbol[];
    }
  | { readonly kind: "unresolvable"; readonly reason: UnresolvableReason };

export type DynamicResolverOptions = {
  /** Modules searched for candidates (default: every module) */
  readonly moduleScope?: readonly string[];
};

/**
 * Only declared classes can be instantiated by runtime name. An opaque
 * symbol may equally be a protocol.
 */
const isInstantiable = (symbol: TypeSymbol): symbol is ClassSymbol =>
  symbol.kind === "class";

export const resolveDynamicClassRef = (
  graph: DeclarationGraph,
  binding: DynamicBinding,
  options: DynamicResolverOptions = {}
): DynamicResolution => {
  if (binding.literalValue === undefined) {
    return { kind: "unresolvable", reason: "not-literal" };
  }

  const scope = options.moduleScope;
  const candidates = graph
    .findByName(binding.literalValue)
    .filter(isInstantiable)
    .filter((symbol) => !scope || scope.includes(symbol.module));

  const [first] = candidates;
  if (!first) {
    return { kind: "unresolvable", reason: "no-match" };
  }
  if (candidates.length === 1) {
    return { kind: "resolved", symbol: first };
  }

  const localMatch = candidates.find((symbol) => graph.isLocal(symbol));
  if (localMatch) {
    return { kind: "resolved", symbol: localMatch };
  }

  return {
    kind: "ambiguous",
    candidates: [...candidates].sort((a, b) =>
      compareModules(a.module, b.module)
    ),
  };
};
