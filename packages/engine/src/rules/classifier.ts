/**
 * Rule classifier
 *
 * Evaluates classification rules against every class in the graph and
 * records the evidence behind each verdict. A query error for one class
 * becomes a diagnostic; the remaining classes are still classified.
 */

import type { ClassificationEngine } from "../query/classification-engine.js";
import type { ResolvedType } from "../resolver/type-resolver.js";
import {
  ClassSymbol,
  DynamicBinding,
  SymbolRef,
  TypeSymbol,
  createOpaque,
  formatRef,
  sameSymbol,
} from "../types/symbol.js";
import {
  Diagnostic,
  createDiagnostic,
  formatDiagnostic,
} from "../types/diagnostic.js";
import { EngineError, toDiagnostic } from "../types/errors.js";
import type {
  ClassificationReport,
  ClassificationRule,
  Finding,
  RuleCondition,
  SiteReport,
  SymbolClassification,
} from "./types.js";

type DynamicCondition = Extract<RuleCondition, { kind: "dynamicallyReferenced" }>;

const describeBinding = (binding: DynamicBinding): string =>
  `${binding.key} = "${binding.literalValue ?? "?"}" at ${binding.siteId}`;

const describeChain = (type: ResolvedType): string =>
  [type.symbol, ...type.canonicalSuperclassChain].map(formatRef).join(" → ");

const describeProtocols = (type: ResolvedType): string =>
  type.effectiveProtocols.length > 0
    ? type.effectiveProtocols.map(formatRef).join(", ")
    : "(none)";

/**
 * Opaque declarations a missing fact could hide behind
 */
const opaqueSources = (type: ResolvedType): readonly string[] => {
  const sources: string[] = [];
  const last = type.canonicalSuperclassChain.at(-1);
  if (type.terminatedAtOpaque && last) {
    sources.push(formatRef(last));
  }
  for (const entry of type.effectiveProtocols) {
    if (entry.kind === "opaque") {
      sources.push(formatRef(entry));
    }
  }
  return sources;
};

const matchesKey = (condition: DynamicCondition, key: string): boolean =>
  !condition.keys || condition.keys.includes(key);

export class RuleClassifier {
  private readonly engine: ClassificationEngine;
  private readonly rules: readonly ClassificationRule[];
  private readonly diagnostics: Diagnostic[] = [];
  private readonly reported = new Set<string>();

  constructor(engine: ClassificationEngine, rules: readonly ClassificationRule[]) {
    this.engine = engine;
    this.rules = rules;
  }

  classify(bindings: readonly DynamicBinding[]): ClassificationReport {
    this.diagnostics.length = 0;
    this.reported.clear();

    const targets = this.resolveRuleTargets();
    const sites = this.resolveSites(bindings);

    const classifications: SymbolClassification[] = [];
    for (const symbol of this.engine.graph.allClassSymbols()) {
      const findings = this.rules.flatMap((rule) => {
        const finding = this.evaluate(symbol, rule, targets, sites);
        return finding ? [finding] : [];
      });
      if (findings.length > 0) {
        classifications.push({ symbol, findings });
      }
    }

    const unresolvedSites = sites.filter(
      (site) => site.resolution.kind !== "resolved"
    );
    for (const site of unresolvedSites) {
      this.report(this.siteDiagnostic(site));
    }

    return {
      classifications,
      unresolvedSites,
      diagnostics: [...this.diagnostics],
    };
  }

  private evaluate(
    symbol: ClassSymbol,
    rule: ClassificationRule,
    targets: ReadonlyMap<ClassificationRule, TypeSymbol>,
    sites: readonly SiteReport[]
  ): Finding | undefined {
    const condition = rule.when;
    switch (condition.kind) {
      case "descendsFrom": {
        const base = targets.get(rule);
        return base ? this.evaluateDescent(symbol, rule, base) : undefined;
      }
      case "conformsTo": {
        const protocol = targets.get(rule);
        return protocol
          ? this.evaluateConformance(symbol, rule, protocol)
          : undefined;
      }
      case "dynamicallyReferenced":
        return this.evaluateDynamic(symbol, rule, condition, sites);
    }
  }

  private evaluateDescent(
    symbol: ClassSymbol,
    rule: ClassificationRule,
    base: TypeSymbol
  ): Finding | undefined {
    const type = this.engine.resolveType(symbol);
    if (!type.ok) {
      return this.reportError(type.error);
    }
    const state = this.engine.isDescendantOf(symbol, base);
    if (!state.ok) {
      return this.reportError(state.error);
    }
    if (state.value === "false") {
      return undefined;
    }

    const evidence = [`superclass chain: ${describeChain(type.value)}`];
    if (state.value === "unknown") {
      evidence.push(
        `ancestry of ${opaqueSources(type.value)[0] ?? "an opaque base"} is unknown`
      );
    }
    return {
      ruleId: rule.id,
      category: rule.category,
      verdict: state.value === "true" ? "match" : "possible",
      evidence,
    };
  }

  private evaluateConformance(
    symbol: ClassSymbol,
    rule: ClassificationRule,
    protocol: TypeSymbol
  ): Finding | undefined {
    const type = this.engine.resolveType(symbol);
    if (!type.ok) {
      return this.reportError(type.error);
    }
    const state = this.engine.conformanceOf(symbol, protocol);
    if (!state.ok) {
      return this.reportError(state.error);
    }
    if (state.value === "false") {
      return undefined;
    }

    const evidence = [`effective protocols: ${describeProtocols(type.value)}`];
    if (state.value === "unknown") {
      evidence.push(
        `conformance to ${formatRef(protocol)} may come from ${opaqueSources(type.value).join(", ")}`
      );
    }
    return {
      ruleId: rule.id,
      category: rule.category,
      verdict: state.value === "true" ? "match" : "possible",
      evidence,
    };
  }

  private evaluateDynamic(
    symbol: ClassSymbol,
    rule: ClassificationRule,
    condition: DynamicCondition,
    sites: readonly SiteReport[]
  ): Finding | undefined {
    const definite: string[] = [];
    const ambiguous: string[] = [];

    for (const { binding, resolution } of sites) {
      if (!matchesKey(condition, binding.key)) {
        continue;
      }
      if (resolution.kind === "resolved" && sameSymbol(resolution.symbol, symbol)) {
        definite.push(describeBinding(binding));
      }
      if (
        resolution.kind === "ambiguous" &&
        resolution.candidates.some((candidate) => sameSymbol(candidate, symbol))
      ) {
        ambiguous.push(
          `${describeBinding(binding)} matches ${resolution.candidates.map(formatRef).join(", ")}`
        );
      }
    }

    if (definite.length === 0 && ambiguous.length === 0) {
      return undefined;
    }
    return {
      ruleId: rule.id,
      category: rule.category,
      verdict: definite.length > 0 ? "match" : "possible",
      evidence: [...definite, ...ambiguous],
    };
  }

  /**
   * Look up the declaration each rule names. An undeclared foreign name is
   * opaque; an undeclared local name disables the rule.
   */
  private resolveRuleTargets(): ReadonlyMap<ClassificationRule, TypeSymbol> {
    const graph = this.engine.graph;
    const targets = new Map<ClassificationRule, TypeSymbol>();

    for (const rule of this.rules) {
      const ref = ruleTarget(rule.when);
      if (!ref) {
        continue;
      }
      const symbol =
        graph.getSymbol(ref.module, ref.name) ??
        (graph.isLocal(ref) ? undefined : createOpaque(ref.name, ref.module));
      if (symbol) {
        targets.set(rule, symbol);
      } else {
        this.report(
          createDiagnostic(
            "LIN1006",
            "error",
            `Rule ${rule.id} refers to undeclared ${formatRef(ref)}`,
            undefined,
            "Fix the rule, or tag the symbol with its external module"
          )
        );
      }
    }

    return targets;
  }

  private resolveSites(bindings: readonly DynamicBinding[]): readonly SiteReport[] {
    const conditions = this.rules
      .map((rule) => rule.when)
      .filter(
        (condition): condition is DynamicCondition =>
          condition.kind === "dynamicallyReferenced"
      );

    return bindings
      .filter((binding) =>
        conditions.some((condition) => matchesKey(condition, binding.key))
      )
      .map((binding) => ({
        binding,
        resolution: this.engine.resolveDynamicName(binding),
      }));
  }

  private siteDiagnostic(site: SiteReport): Diagnostic {
    const { binding, resolution } = site;
    if (resolution.kind === "ambiguous") {
      return createDiagnostic(
        "LIN2002",
        "warning",
        `${describeBinding(binding)} matches ${resolution.candidates.map(formatRef).join(", ")}`
      );
    }
    const reason =
      resolution.kind === "unresolvable" && resolution.reason === "no-match"
        ? "no declared class has this name"
        : "the value is not a static literal";
    return createDiagnostic(
      "LIN2001",
      "info",
      `${binding.key} at ${binding.siteId} cannot be resolved: ${reason}`
    );
  }

  private reportError(err: EngineError): undefined {
    this.report(toDiagnostic(err));
    return undefined;
  }

  private report(diagnostic: Diagnostic): void {
    const key = formatDiagnostic(diagnostic);
    if (!this.reported.has(key)) {
      this.reported.add(key);
      this.diagnostics.push(diagnostic);
    }
  }
}

const ruleTarget = (condition: RuleCondition): SymbolRef | undefined => {
  switch (condition.kind) {
    case "descendsFrom":
      return condition.base;
    case "conformsTo":
      return condition.protocol;
    case "dynamicallyReferenced":
      return undefined;
  }
};

export const classify = (
  engine: ClassificationEngine,
  rules: readonly ClassificationRule[],
  bindings: readonly DynamicBinding[]
): ClassificationReport => new RuleClassifier(engine, rules).classify(bindings);

