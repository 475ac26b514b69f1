/**
 * Inheritance and conformance resolution
 *
 * Computes the superclass chain and effective protocol set of a class,
 * looking through aliases. Opaque symbols are closed leaves: a chain that
 * reaches one stops there.
 */

import type { DeclarationGraph } from "../graph/declaration-graph.js";
import {
  AncestorSymbol,
  CapabilitySymbol,
  ClassSymbol,
  ProtocolSymbol,
  SymbolRef,
  TypeSymbol,
  sameSymbol,
  symbolKey,
} from "../types/symbol.js";
import {
  EngineError,
  cyclicInheritance,
  invalidSuperclassAlias,
  kindMismatch,
  notAClass,
} from "../types/errors.js";
import { Result, ok, error } from "../types/result.js";
import { resolveAlias, targetsOf } from "./alias-resolver.js";
import { ResolutionCache } from "./resolution-cache.js";

export type ResolvedType = {
  readonly symbol: ClassSymbol;
  /** Nearest first; ends at a root class or an opaque symbol */
  readonly canonicalSuperclassChain: readonly AncestorSymbol[];
  /** First-seen order, no duplicates */
  readonly effectiveProtocols: readonly CapabilitySymbol[];
  readonly terminatedAtOpaque: boolean;
};

type SuperclassChain = {
  readonly chain: readonly AncestorSymbol[];
  readonly terminatedAtOpaque: boolean;
};

export const resolveType = (
  graph: DeclarationGraph,
  symbol: TypeSymbol
): Result<ResolvedType, EngineError> => {
  if (symbol.kind !== "class") {
    return error(notAClass(symbol));
  }

  const chain = resolveSuperclassChain(graph, symbol);
  if (!chain.ok) {
    return chain;
  }

  const owners = [
    symbol,
    ...chain.value.chain.filter(
      (entry): entry is ClassSymbol => entry.kind === "class"
    ),
  ];
  const protocols = collectProtocols(graph, owners);
  if (!protocols.ok) {
    return protocols;
  }

  return ok({
    symbol,
    canonicalSuperclassChain: chain.value.chain,
    effectiveProtocols: protocols.value,
    terminatedAtOpaque: chain.value.terminatedAtOpaque,
  });
};

const resolveSuperclassChain = (
  graph: DeclarationGraph,
  symbol: ClassSymbol
): Result<SuperclassChain, EngineError> => {
  const chain: AncestorSymbol[] = [];
  const visited: ClassSymbol[] = [symbol];
  let current = symbol;

  while (current.declaredSuperclass) {
    const declared = graph.resolveReference(current.declaredSuperclass, current);
    if (!declared.ok) {
      return declared;
    }

    const resolved = resolveAlias(graph, declared.value);
    if (!resolved.ok) {
      return resolved;
    }
    if (resolved.value.kind === "composition") {
      return error(invalidSuperclassAlias(current, declared.value));
    }

    const base = resolved.value.symbol;
    if (base.kind === "opaque") {
      chain.push(base);
      return ok({ chain, terminatedAtOpaque: true });
    }
    if (base.kind !== "class") {
      return error(kindMismatch(current, base, "class"));
    }

    const seenAt = visited.findIndex((entry) => sameSymbol(entry, base));
    if (seenAt >= 0) {
      return error(cyclicInheritance([...visited.slice(seenAt), base]));
    }

    visited.push(base);
    chain.push(base);
    current = base;
  }

  return ok({ chain, terminatedAtOpaque: false });
};

const collectProtocols = (
  graph: DeclarationGraph,
  owners: readonly ClassSymbol[]
): Result<readonly CapabilitySymbol[], EngineError> => {
  const collected: CapabilitySymbol[] = [];
  const seen = new Set<string>();

  const visit = (
    ref: SymbolRef,
    from: ClassSymbol | ProtocolSymbol,
    path: readonly ProtocolSymbol[]
  ): Result<void, EngineError> => {
    const declared = graph.resolveReference(ref, from);
    if (!declared.ok) {
      return declared;
    }
    const resolved = resolveAlias(graph, declared.value);
    if (!resolved.ok) {
      return resolved;
    }

    for (const member of targetsOf(resolved.value)) {
      if (member.kind === "class") {
        return error(kindMismatch(from, member, "protocol"));
      }

      if (member.kind === "protocol") {
        const seenAt = path.findIndex((entry) => sameSymbol(entry, member));
        if (seenAt >= 0) {
          return error(cyclicInheritance([...path.slice(seenAt), member]));
        }
      }

      const key = symbolKey(member);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      collected.push(member);

      if (member.kind === "protocol") {
        for (const parent of member.declaredProtocols) {
          const result = visit(parent, member, [...path, member]);
          if (!result.ok) {
            return result;
          }
        }
      }
    }

    return ok(undefined);
  };

  for (const owner of owners) {
    for (const ref of owner.declaredProtocols) {
      const result = visit(ref, owner, []);
      if (!result.ok) {
        return result;
      }
    }
  }

  return ok(collected);
};

/**
 * Memoizing front for {@link resolveType}, keyed by symbol and graph revision
 */
export class TypeResolver {
  private readonly cache = new ResolutionCache<
    Result<ResolvedType, EngineError>
  >();

  constructor(private readonly graph: DeclarationGraph) {}

  resolve(symbol: TypeSymbol): Result<ResolvedType, EngineError> {
    return this.cache.getOrCompute(symbolKey(symbol), this.graph.revision, () =>
      resolveType(this.graph, symbol)
    );
  }

  get cachedEntries(): number {
    return this.cache.size;
  }
}
