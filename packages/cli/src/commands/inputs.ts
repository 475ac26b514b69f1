/**
 * Input loading - graph files and TypeScript sources merged into one graph
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { join, relative } from "node:path";
import {
  DeclarationGraph,
  Diagnostic,
  DynamicBinding,
  TypeSymbol,
  createDeclarationGraph,
  createDiagnostic,
  loadGraphFile,
  symbolKey,
  toDiagnostic,
} from "@lineage/engine";
import { extractFromFiles } from "@lineage/extractor";
import type { ResolvedConfig, Result } from "../types.js";

export type LoadedInputs = {
  readonly graph: DeclarationGraph;
  readonly bindings: readonly DynamicBinding[];
  /** Warnings raised while reading sources */
  readonly diagnostics: readonly Diagnostic[];
};

const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"];

const isSourceFile = (file: string): boolean =>
  SOURCE_EXTENSIONS.some((ext) => file.endsWith(ext));

const isGraphFile = (file: string): boolean => file.endsWith(".json");

/**
 * TypeScript sources under a directory, skipping declaration files and
 * node_modules
 */
const collectSourceFiles = (dir: string): string[] => {
  const files: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name !== "node_modules" && !entry.name.startsWith(".")) {
        files.push(...collectSourceFiles(fullPath));
      }
    } else if (isSourceFile(entry.name) && !entry.name.endsWith(".d.ts")) {
      files.push(fullPath);
    }
  }
  return files;
};

/**
 * Combine symbols from several inputs. An opaque symbol repeated across
 * inputs, or shadowed by a real declaration, is kept once; any other repeat
 * is left for the graph to report as a duplicate.
 */
export const mergeSymbols = (
  groups: readonly (readonly TypeSymbol[])[]
): readonly TypeSymbol[] => {
  const merged: TypeSymbol[] = [];
  const indexByKey = new Map<string, number>();

  for (const symbol of groups.flat()) {
    const key = symbolKey(symbol);
    const index = indexByKey.get(key);
    const existing = index === undefined ? undefined : merged[index];
    if (index === undefined || !existing) {
      indexByKey.set(key, merged.length);
      merged.push(symbol);
    } else if (symbol.kind === "opaque") {
      continue;
    } else if (existing.kind === "opaque") {
      merged[index] = symbol;
    } else {
      merged.push(symbol);
    }
  }

  return merged;
};

/**
 * Load every configured input and build the declaration graph
 */
export const loadInputs = (
  config: ResolvedConfig
): Result<LoadedInputs, readonly Diagnostic[]> => {
  const graphFiles: string[] = [];
  const sourceFiles: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const input of config.inputs) {
    if (existsSync(input) && statSync(input).isDirectory()) {
      sourceFiles.push(...collectSourceFiles(input));
    } else if (isGraphFile(input)) {
      graphFiles.push(input);
    } else if (isSourceFile(input)) {
      sourceFiles.push(input);
    } else {
      diagnostics.push(
        createDiagnostic(
          "LIN3004",
          "error",
          `Unsupported input: ${input}`,
          undefined,
          "Inputs are .json graph files, TypeScript sources or directories of sources"
        )
      );
    }
  }

  const groups: (readonly TypeSymbol[])[] = [];
  const bindings: DynamicBinding[] = [];

  for (const file of graphFiles) {
    const document = loadGraphFile(file);
    if (!document.ok) {
      diagnostics.push(...document.error);
      continue;
    }
    if (config.verbose) {
      console.log(
        `[inputs] ${relative(config.projectRoot, file)}: ${document.value.symbols.length} symbols, ${document.value.bindings.length} bindings`
      );
    }
    groups.push(document.value.symbols);
    bindings.push(...document.value.bindings);
  }

  const warnings: Diagnostic[] = [];
  if (sourceFiles.length > 0) {
    const extraction = extractFromFiles(sourceFiles, {
      localModule: config.localModule,
      dynamicKeys: config.dynamicKeys,
      rootDir: config.projectRoot,
    });
    if (!extraction.ok) {
      diagnostics.push(...extraction.error);
    } else {
      if (config.verbose) {
        console.log(
          `[inputs] ${sourceFiles.length} source files: ${extraction.value.symbols.length} symbols, ${extraction.value.bindings.length} bindings`
        );
      }
      groups.push(extraction.value.symbols);
      bindings.push(...extraction.value.bindings);
      warnings.push(...extraction.value.diagnostics);
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  const graph = createDeclarationGraph(mergeSymbols(groups), {
    localModule: config.localModule,
  });
  if (!graph.ok) {
    return { ok: false, error: graph.error.map(toDiagnostic) };
  }

  return {
    ok: true,
    value: { graph: graph.value, bindings, diagnostics: warnings },
  };
};
