/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic, type Diagnostic } from "@lineage/engine";
import { loadConfig, findConfig, resolveConfig, CONFIG_FILE } from "../config.js";
import { classifyCommand } from "../commands/classify.js";
import { resolveCommand } from "../commands/resolve.js";
import { lookupCommand } from "../commands/lookup.js";
import type {
  CommandOutcome,
  LineageConfig,
  ResolvedConfig,
  Result,
} from "../types.js";
import { COMMANDS, CommandName, EXIT, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const isCommand = (value: string): value is CommandName =>
  COMMANDS.some((command) => command === value);

const runCommand = (
  command: CommandName,
  config: ResolvedConfig,
  subject: string
): Result<CommandOutcome, readonly Diagnostic[]> => {
  switch (command) {
    case "classify":
      return classifyCommand(config);
    case "resolve":
      return resolveCommand(config, subject);
    case "lookup":
      return lookupCommand(config, subject);
  }
};

const printDiagnostics = (
  diagnostics: readonly Diagnostic[],
  verbose: boolean
): void => {
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === "info" && !verbose) {
      continue;
    }
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run 'lineage --help' for usage information");
    return EXIT.usage;
  }

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`lineage v${VERSION}`);
    return EXIT.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT.ok;
  }

  if (!isCommand(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'lineage --help' for usage information");
    return EXIT.usage;
  }

  // resolve and lookup take the name before the inputs
  const [subject, ...rest] = parsed.positionals;
  const needsSubject = parsed.command !== "classify";
  if (needsSubject && subject === undefined) {
    console.error(
      `Error: ${parsed.command === "resolve" ? "Type name" : "Class name"} required`
    );
    console.error(`Usage: lineage ${parsed.command} <name> [inputs...]`);
    return EXIT.usage;
  }
  const cliInputs = needsSubject ? rest : parsed.positionals;

  // Load config
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath && cliInputs.length === 0) {
    console.error(`Error: No ${CONFIG_FILE} found and no inputs given`);
    console.error("Name inputs on the command line or list them in lineage.json");
    return EXIT.noInputs;
  }

  let fileConfig: LineageConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT.usage;
    }
    fileConfig = configResult.value;
  }

  // Config inputs are relative to the directory containing lineage.json
  const projectRoot = configPath ? dirname(configPath) : cwd;
  const config = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    cwd,
    cliInputs
  );

  if (config.inputs.length === 0) {
    console.error("Error: No inputs given");
    console.error(`List graph files or sources under 'inputs' in ${CONFIG_FILE}`);
    return EXIT.noInputs;
  }

  if (config.verbose) {
    console.log(
      `[config] ${configPath ?? "(none)"}: ${config.inputs.length} inputs, local module '${config.localModule}'`
    );
  }

  if (parsed.command === "classify" && config.rules.length === 0) {
    console.error(`Error: No rules configured in ${CONFIG_FILE}`);
    return EXIT.noInputs;
  }

  const result = runCommand(parsed.command, config, subject ?? "");

  if (!result.ok) {
    printDiagnostics(result.error, true);
    return EXIT.usage;
  }

  for (const line of result.value.output) {
    console.log(line);
  }
  printDiagnostics(result.value.diagnostics, config.verbose);
  return result.value.exitCode;
};
