/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
lineage - class heritage classifier v${VERSION}

USAGE:
  lineage <command> [inputs...] [options]

COMMANDS:
  classify [inputs...]            Apply the configured rules to every class
  resolve <Type> [inputs...]      Show the superclass chain and protocols of a class
  lookup <name> [inputs...]       Resolve a class name as a runtime string reference

INPUTS:
  *.json graph files, TypeScript sources, or directories of sources.
  Without inputs, the 'inputs' list of lineage.json is used.

OPTIONS:
  -h, --help                      Show help
  -v, --version                   Show version
  -V, --verbose                   Verbose output
  -q, --quiet                     Suppress summaries
  -c, --config <file>             Config file path (default: lineage.json, searched upward)
  --json                          Print results as JSON
  --local-module <name>           Module of declarations read from sources (default: local)

EXIT CODES:
  0  success
  1  usage or input error
  2  resolution error, or a name that does not resolve
  3  no configuration or no inputs

EXAMPLES:
  lineage classify
  lineage classify app.graph.json --json
  lineage resolve MyCustomView src
  lineage lookup ProfileScreen src
`);
};
