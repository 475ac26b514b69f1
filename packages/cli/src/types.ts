/**
 * Type definitions for CLI
 */

import type { ClassificationRule, Diagnostic } from "@lineage/engine";

/**
 * Reference as written in lineage.json; `module` defaults to the local module
 */
export type ConfigRef = {
  readonly module?: string;
  readonly name: string;
};

export type ConfigRuleCondition =
  | { readonly kind: "descendsFrom"; readonly base: ConfigRef }
  | { readonly kind: "conformsTo"; readonly protocol: ConfigRef }
  | {
      readonly kind: "dynamicallyReferenced";
      readonly keys?: readonly string[];
    };

export type ConfigRule = {
  readonly id: string;
  readonly category: string;
  readonly when: ConfigRuleCondition;
};

/**
 * Lineage configuration file (lineage.json)
 */
export type LineageConfig = {
  readonly $schema?: string;
  readonly localModule?: string;
  /** Graph files, TypeScript sources or source directories */
  readonly inputs?: readonly string[];
  /** Binding keys recorded from sources; defaults to the keys the rules use */
  readonly dynamicKeys?: readonly string[];
  /** Modules considered when resolving dynamic references */
  readonly moduleScope?: readonly string[];
  readonly rules?: readonly ConfigRule[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  json?: boolean;
  localModule?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing lineage.json
  readonly localModule: string;
  readonly inputs: readonly string[]; // Absolute paths
  readonly dynamicKeys: readonly string[] | undefined; // undefined records every key
  readonly moduleScope: readonly string[] | undefined;
  readonly rules: readonly ClassificationRule[];
  readonly json: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * What a command prints and how the process exits
 */
export type CommandOutcome = {
  readonly exitCode: number;
  readonly output: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
};

export type { Result } from "@lineage/engine";
