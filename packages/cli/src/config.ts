/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, basename } from "node:path";
import {
  LOCAL_MODULE,
  type ClassificationRule,
  type RuleCondition,
  type SymbolRef,
} from "@lineage/engine";
import type {
  CliOptions,
  ConfigRef,
  ConfigRule,
  ConfigRuleCondition,
  LineageConfig,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE = "lineage.json";

type Json = Record<string, unknown>;

const isObject = (value: unknown): value is Json =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringList = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "string");

const parseRef = (value: unknown): ConfigRef | undefined => {
  if (!isObject(value) || typeof value.name !== "string" || value.name === "") {
    return undefined;
  }
  if (value.module === undefined) {
    return { name: value.name };
  }
  return typeof value.module === "string" && value.module !== ""
    ? { module: value.module, name: value.name }
    : undefined;
};

const parseCondition = (value: unknown): ConfigRuleCondition | undefined => {
  if (!isObject(value)) {
    return undefined;
  }
  switch (value.kind) {
    case "descendsFrom": {
      const base = parseRef(value.base);
      return base ? { kind: "descendsFrom", base } : undefined;
    }
    case "conformsTo": {
      const protocol = parseRef(value.protocol);
      return protocol ? { kind: "conformsTo", protocol } : undefined;
    }
    case "dynamicallyReferenced":
      if (value.keys === undefined) {
        return { kind: "dynamicallyReferenced" };
      }
      return isStringList(value.keys)
        ? { kind: "dynamicallyReferenced", keys: value.keys }
        : undefined;
    default:
      return undefined;
  }
};

const parseRule = (value: unknown, index: number): Result<ConfigRule, string> => {
  if (
    !isObject(value) ||
    typeof value.id !== "string" ||
    typeof value.category !== "string"
  ) {
    return {
      ok: false,
      error: `rule ${index} needs string 'id' and 'category'`,
    };
  }
  const when = parseCondition(value.when);
  if (!when) {
    return {
      ok: false,
      error: `rule '${value.id}' has an invalid 'when' (descendsFrom with base, conformsTo with protocol, or dynamicallyReferenced with optional keys)`,
    };
  }
  return { ok: true, value: { id: value.id, category: value.category, when } };
};

/**
 * Validate parsed lineage.json content
 */
export const parseConfig = (
  data: unknown,
  fileName: string = CONFIG_FILE
): Result<LineageConfig, string> => {
  if (!isObject(data)) {
    return { ok: false, error: `${fileName}: must be an object` };
  }

  if (
    data.localModule !== undefined &&
    (typeof data.localModule !== "string" || data.localModule === "")
  ) {
    return {
      ok: false,
      error: `${fileName}: 'localModule' must be a non-empty string`,
    };
  }

  for (const field of ["inputs", "dynamicKeys", "moduleScope"] as const) {
    if (data[field] !== undefined && !isStringList(data[field])) {
      return {
        ok: false,
        error: `${fileName}: '${field}' must be a list of strings`,
      };
    }
  }

  const rules: ConfigRule[] = [];
  if (data.rules !== undefined) {
    if (!Array.isArray(data.rules)) {
      return { ok: false, error: `${fileName}: 'rules' must be an array` };
    }
    for (const [index, entry] of data.rules.entries()) {
      const rule = parseRule(entry, index);
      if (!rule.ok) {
        return { ok: false, error: `${fileName}: ${rule.error}` };
      }
      rules.push(rule.value);
    }
    const ids = rules.map((rule) => rule.id);
    const duplicate = ids.find((id, index) => ids.indexOf(id) !== index);
    if (duplicate !== undefined) {
      return {
        ok: false,
        error: `${fileName}: rule id '${duplicate}' is used more than once`,
      };
    }
  }

  return {
    ok: true,
    value: {
      $schema: typeof data.$schema === "string" ? data.$schema : undefined,
      localModule: typeof data.localModule === "string" ? data.localModule : undefined,
      inputs: isStringList(data.inputs) ? data.inputs : undefined,
      dynamicKeys: isStringList(data.dynamicKeys) ? data.dynamicKeys : undefined,
      moduleScope: isStringList(data.moduleScope) ? data.moduleScope : undefined,
      rules: data.rules === undefined ? undefined : rules,
    },
  };
};

/**
 * Load lineage.json
 */
export const loadConfig = (
  configPath: string
): Result<LineageConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${basename(configPath)}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return parseConfig(data, basename(configPath));
};

/**
 * Find lineage.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const toRef = (ref: ConfigRef, localModule: string): SymbolRef => ({
  module: ref.module ?? localModule,
  name: ref.name,
});

const toCondition = (
  condition: ConfigRuleCondition,
  localModule: string
): RuleCondition => {
  switch (condition.kind) {
    case "descendsFrom":
      return { kind: "descendsFrom", base: toRef(condition.base, localModule) };
    case "conformsTo":
      return {
        kind: "conformsTo",
        protocol: toRef(condition.protocol, localModule),
      };
    case "dynamicallyReferenced":
      return condition;
  }
};

/**
 * Binding keys the rules look at. undefined when some dynamic rule takes
 * every key.
 */
const keysFromRules = (
  rules: readonly ClassificationRule[]
): readonly string[] | undefined => {
  const keys: string[] = [];
  for (const rule of rules) {
    if (rule.when.kind !== "dynamicallyReferenced") {
      continue;
    }
    if (!rule.when.keys) {
      return undefined;
    }
    keys.push(...rule.when.keys.filter((key) => !keys.includes(key)));
  }
  return keys;
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing lineage.json; config inputs are relative to it
 * @param cliInputs - Inputs named on the command line, relative to `cwd`
 */
export const resolveConfig = (
  config: LineageConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  cwd: string = projectRoot,
  cliInputs: readonly string[] = []
): ResolvedConfig => {
  const localModule = cliOptions.localModule ?? config.localModule ?? LOCAL_MODULE;
  const rules = (config.rules ?? []).map(
    (rule): ClassificationRule => ({
      id: rule.id,
      category: rule.category,
      when: toCondition(rule.when, localModule),
    })
  );

  const inputs =
    cliInputs.length > 0
      ? cliInputs.map((input) => resolve(cwd, input))
      : (config.inputs ?? []).map((input) => resolve(projectRoot, input));

  return {
    projectRoot,
    localModule,
    inputs,
    dynamicKeys: config.dynamicKeys ?? keysFromRules(rules),
    moduleScope: config.moduleScope,
    rules,
    json: cliOptions.json ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
