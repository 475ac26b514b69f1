/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  positionals: string[];
  options: CliOptions;
  error?: string;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const positionals: string[] = [];

  const valueOf = (next: string | undefined): string | undefined =>
    next !== undefined && !next.startsWith("-") ? next : undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    if (!arg.startsWith("-")) {
      positionals.push(arg);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", positionals: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", positionals: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "--json":
        options.json = true;
        break;
      case "-c":
      case "--config":
      case "--local-module": {
        const value = valueOf(args[i + 1]);
        if (value === undefined) {
          return { command, positionals, options, error: `${arg} requires a value` };
        }
        i++;
        if (arg === "--local-module") {
          options.localModule = value;
        } else {
          options.config = value;
        }
        break;
      }
      default:
        return { command, positionals, options, error: `Unknown option '${arg}'` };
    }
  }

  return { command, positionals, options };
};
