/**
 * Fixture projects and configs for command tests
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { loadConfig, resolveConfig } from "../config.js";
import type { CliOptions, ResolvedConfig } from "../types.js";

const fixturesDir = fileURLToPath(new URL("../../test/fixtures", import.meta.url));

/** Graph-file project */
export const scenarioDir = path.join(fixturesDir, "scenario");

/** TypeScript-source project */
export const sourcesDir = path.join(fixturesDir, "sources");

/**
 * Resolved configuration of a fixture project's lineage.json
 */
export const fixtureConfig = (
  projectRoot: string,
  options: CliOptions = {}
): ResolvedConfig => {
  const config = loadConfig(path.join(projectRoot, "lineage.json"));
  if (!config.ok) {
    throw new Error(config.error);
  }
  return resolveConfig(config.value, options, projectRoot);
};

/**
 * Temporary project holding `files`. Returns its root.
 */
export const createProject = (
  files: Readonly<Record<string, string>>
): { readonly root: string; readonly cleanup: () => void } => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "lineage-test-"));
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(root, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  return {
    root,
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
};
