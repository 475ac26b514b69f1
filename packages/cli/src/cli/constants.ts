/**
 * CLI constants
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Version from the nearest package.json above this module
 */
const readVersion = (): string => {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    const packagePath = join(dir, "package.json");
    if (existsSync(packagePath)) {
      const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
      return typeof packageJson === "object" &&
        packageJson !== null &&
        "version" in packageJson &&
        typeof packageJson.version === "string"
        ? packageJson.version
        : "0.0.0";
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return "0.0.0";
    }
    dir = parent;
  }
};

export const VERSION = readVersion();

export const COMMANDS = ["classify", "resolve", "lookup"] as const;

export type CommandName = (typeof COMMANDS)[number];

/** Process exit codes */
export const EXIT = {
  ok: 0,
  usage: 1,
  resolution: 2,
  noInputs: 3,
} as const;
