/**
 * Classification query API
 *
 * Read-only façade over a declaration graph. Answers that depend on opaque
 * declarations come back as "unknown", never as "false".
 */

import type { DeclarationGraph } from "../graph/declaration-graph.js";
import {
  AncestorSymbol,
  CapabilitySymbol,
  ClassSymbol,
  DynamicBinding,
  TypeSymbol,
  sameSymbol,
} from "../types/symbol.js";
import { EngineError, kindMismatch } from "../types/errors.js";
import { Result, ok, error } from "../types/result.js";
import { resolveAlias, targetsOf } from "../resolver/alias-resolver.js";
import { ResolvedType, TypeResolver } from "../resolver/type-resolver.js";
import {
  DynamicResolution,
  DynamicResolverOptions,
  resolveDynamicClassRef,
} from "../resolver/dynamic-resolver.js";

export type TriState = "true" | "false" | "unknown";

export type ClassificationEngineOptions = DynamicResolverOptions;

export class ClassificationEngine {
  readonly graph: DeclarationGraph;
  private readonly options: ClassificationEngineOptions;
  private readonly types: TypeResolver;

  constructor(
    graph: DeclarationGraph,
    options: ClassificationEngineOptions = {}
  ) {
    this.graph = graph;
    this.options = options;
    this.types = new TypeResolver(graph);
  }

  resolveType(symbol: TypeSymbol): Result<ResolvedType, EngineError> {
    return this.types.resolve(symbol);
  }

  /**
   * Class named `name`, preferring the local module
   */
  findClass(name: string): ClassSymbol | undefined {
    const classes = this.graph
      .findByName(name)
      .filter((symbol): symbol is ClassSymbol => symbol.kind === "class");
    return classes.find((symbol) => this.graph.isLocal(symbol)) ?? classes[0];
  }

  /**
   * Whether `candidateBase` is a known class in the superclass chain of
   * `symbol`. When the chain ends at an opaque symbol, any other base is
   * "unknown", the opaque symbol itself included.
   */
  isDescendantOf(
    symbol: TypeSymbol,
    candidateBase: TypeSymbol
  ): Result<TriState, EngineError> {
    const type = this.types.resolve(symbol);
    if (!type.ok) {
      return type;
    }
    const base = this.resolveBase(symbol, candidateBase);
    if (!base.ok) {
      return base;
    }

    if (sameSymbol(symbol, base.value)) {
      return ok("false");
    }
    const chain = type.value.canonicalSuperclassChain;
    if (
      chain.some(
        (ancestor) => ancestor.kind === "class" && sameSymbol(ancestor, base.value)
      )
    ) {
      return ok("true");
    }
    return ok(type.value.terminatedAtOpaque ? "unknown" : "false");
  }

  /**
   * Proven conformance. A composition requires every member.
   */
  conformsTo(
    symbol: TypeSymbol,
    protocol: TypeSymbol
  ): Result<boolean, EngineError> {
    const state = this.conformanceOf(symbol, protocol);
    if (!state.ok) {
      return state;
    }
    return ok(state.value === "true");
  }

  /**
   * Conformance with open-world uncertainty: "unknown" when an opaque
   * ancestor or opaque protocol could supply what is missing.
   */
  conformanceOf(
    symbol: TypeSymbol,
    protocol: TypeSymbol
  ): Result<TriState, EngineError> {
    const type = this.types.resolve(symbol);
    if (!type.ok) {
      return type;
    }
    const required = this.resolveRequirements(symbol, protocol);
    if (!required.ok) {
      return required;
    }

    const effective = type.value.effectiveProtocols;
    const missing = required.value.filter(
      (requirement) => !effective.some((entry) => sameSymbol(entry, requirement))
    );
    if (missing.length === 0) {
      return ok("true");
    }

    const open =
      type.value.terminatedAtOpaque ||
      effective.some((entry) => entry.kind === "opaque");
    return ok(open ? "unknown" : "false");
  }

  resolveDynamicName(binding: DynamicBinding): DynamicResolution {
    return resolveDynamicClassRef(this.graph, binding, this.options);
  }

  private resolveBase(
    subject: TypeSymbol,
    candidate: TypeSymbol
  ): Result<AncestorSymbol, EngineError> {
    const resolved = resolveAlias(this.graph, candidate);
    if (!resolved.ok) {
      return resolved;
    }
    if (resolved.value.kind === "composition") {
      return error(kindMismatch(subject, candidate, "class"));
    }
    const base = resolved.value.symbol;
    if (base.kind === "protocol") {
      return error(kindMismatch(subject, base, "class"));
    }
    return ok(base);
  }

  private resolveRequirements(
    subject: TypeSymbol,
    protocol: TypeSymbol
  ): Result<readonly CapabilitySymbol[], EngineError> {
    const resolved = resolveAlias(this.graph, protocol);
    if (!resolved.ok) {
      return resolved;
    }
    const requirements: CapabilitySymbol[] = [];
    for (const target of targetsOf(resolved.value)) {
      if (target.kind === "class") {
        return error(kindMismatch(subject, target, "protocol"));
      }
      requirements.push(target);
    }
    return ok(requirements);
  }
}
