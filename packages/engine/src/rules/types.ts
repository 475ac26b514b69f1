/**
 * Rule classifier types
 */

import type { Diagnostic } from "../types/diagnostic.js";
import type { ClassSymbol, DynamicBinding, SymbolRef } from "../types/symbol.js";
import type { DynamicResolution } from "../resolver/dynamic-resolver.js";

export type RuleCondition =
  | { readonly kind: "descendsFrom"; readonly base: SymbolRef }
  | { readonly kind: "conformsTo"; readonly protocol: SymbolRef }
  | {
      readonly kind: "dynamicallyReferenced";
      readonly keys?: readonly string[]; // every key when absent
    };

export type ClassificationRule = {
  readonly id: string;
  readonly category: string;
  readonly when: RuleCondition;
};

/**
 * "possible" means the rule could hold but depends on an opaque declaration
 * or an ambiguous name.
 */
export type FindingVerdict = "match" | "possible";

export type Finding = {
  readonly ruleId: string;
  readonly category: string;
  readonly verdict: FindingVerdict;
  readonly evidence: readonly string[];
};

export type SymbolClassification = {
  readonly symbol: ClassSymbol;
  readonly findings: readonly Finding[];
};

export type SiteReport = {
  readonly binding: DynamicBinding;
  readonly resolution: DynamicResolution;
};

export type ClassificationReport = {
  /** Classes with at least one finding, in declaration order */
  readonly classifications: readonly SymbolClassification[];
  /** Bindings that did not resolve to exactly one class */
  readonly unresolvedSites: readonly SiteReport[];
  readonly diagnostics: readonly Diagnostic[];
};
