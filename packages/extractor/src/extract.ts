/**
 * Source extractor - builds declaration graph input from TypeScript sources
 *
 * Syntax only: no type checker runs, so names are resolved through the
 * file's import declarations and the set of names declared across all
 * scanned files.
 *
 * - classes become classes (`extends` is the superclass, `implements` the
 *   protocols)
 * - interfaces become protocols (`extends` lists refined protocols);
 *   repeated interface declarations merge
 * - `type A = B` becomes a single alias, `type A = B & C` a composition
 * - names imported from packages become opaque symbols of that package;
 *   names neither declared nor imported become opaque symbols of the
 *   "ambient" module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as ts from "typescript";
import {
  Diagnostic,
  DynamicBinding,
  LOCAL_MODULE,
  OpaqueSymbol,
  Result,
  SymbolRef,
  TypeSymbol,
  createAlias,
  createClass,
  createDiagnostic,
  createOpaque,
  createProtocol,
  sameSymbol,
  symbolKey,
} from "@lineage/engine";
import type {
  Extraction,
  ExtractOptions,
  SourceInput,
  WrittenName,
} from "./types.js";
import { ImportScope, collectImports, isExternalSpecifier } from "./imports.js";
import { HeritageEntry, collectDeclarations } from "./declarations.js";
import { collectBindings } from "./bindings.js";

export const AMBIENT_MODULE = "ambient";

/**
 * Resolve a written name to the declaration it denotes in this file
 */
export const resolveWrittenName = (
  written: WrittenName,
  imports: ImportScope,
  localNames: ReadonlySet<string>,
  localModule: string
): SymbolRef => {
  if (written.qualifier !== undefined) {
    const specifier = imports.namespaces.get(written.qualifier);
    if (specifier === undefined) {
      return {
        module: AMBIENT_MODULE,
        name: `${written.qualifier}.${written.name}`,
      };
    }
    return {
      module: isExternalSpecifier(specifier) ? specifier : localModule,
      name: written.name,
    };
  }

  const imported = imports.names.get(written.name);
  if (imported) {
    return {
      module: isExternalSpecifier(imported.specifier)
        ? imported.specifier
        : localModule,
      name: imported.exportedName,
    };
  }

  return localNames.has(written.name)
    ? { module: localModule, name: written.name }
    : { module: AMBIENT_MODULE, name: written.name };
};

const appendUnique = (
  existing: readonly SymbolRef[],
  added: readonly SymbolRef[]
): readonly SymbolRef[] => [
  ...existing,
  ...added.filter(
    (ref, index) =>
      !existing.some((other) => sameSymbol(other, ref)) &&
      added.findIndex((other) => sameSymbol(other, ref)) === index
  ),
];

export const extractDeclarations = (
  files: readonly SourceInput[],
  options: ExtractOptions = {}
): Extraction => {
  const localModule = options.localModule ?? LOCAL_MODULE;

  const parsed = files.map((file) => {
    const sourceFile = ts.createSourceFile(
      file.fileName,
      file.content,
      ts.ScriptTarget.Latest,
      true,
      ts.ScriptKind.TS
    );
    return {
      sourceFile,
      imports: collectImports(sourceFile),
      declarations: collectDeclarations(sourceFile),
    };
  });

  const localNames = new Set(
    parsed.flatMap((file) => file.declarations.map((decl) => decl.name))
  );

  const symbols: TypeSymbol[] = [];
  const protocolIndex = new Map<string, number>();
  const foreign = new Map<string, OpaqueSymbol>();
  const bindings: DynamicBinding[] = [];
  const diagnostics: Diagnostic[] = [];

  const noteForeign = (ref: SymbolRef): SymbolRef => {
    const key = symbolKey(ref);
    if (ref.module !== localModule && !foreign.has(key)) {
      foreign.set(key, createOpaque(ref.name, ref.module));
    }
    return ref;
  };

  for (const { sourceFile, imports, declarations } of parsed) {
    const resolve = (written: WrittenName): SymbolRef =>
      noteForeign(
        resolveWrittenName(written, imports, localNames, localModule)
      );

    const heritage = (entry: HeritageEntry): SymbolRef => {
      if (entry.kind === "name") {
        return resolve(entry.written);
      }
      diagnostics.push(
        createDiagnostic(
          "LIN3001",
          "warning",
          `Heritage clause '${entry.text}' is not a type reference`,
          entry.location,
          "It is recorded as an opaque declaration, so answers that depend on it are unknown"
        )
      );
      return noteForeign({ module: AMBIENT_MODULE, name: entry.text });
    };

    for (const decl of declarations) {
      switch (decl.kind) {
        case "class":
          symbols.push(
            createClass(decl.name, {
              module: localModule,
              superclass: decl.superclass && heritage(decl.superclass),
              protocols: decl.protocols.map(heritage),
              location: decl.location,
            })
          );
          break;

        case "protocol": {
          const protocols = decl.protocols.map(heritage);
          const index = protocolIndex.get(decl.name);
          const previous = index === undefined ? undefined : symbols[index];
          if (index !== undefined && previous?.kind === "protocol") {
            symbols[index] = {
              ...previous,
              declaredProtocols: appendUnique(
                previous.declaredProtocols,
                protocols
              ),
            };
          } else {
            protocolIndex.set(decl.name, symbols.length);
            symbols.push(
              createProtocol(decl.name, {
                module: localModule,
                protocols,
                location: decl.location,
              })
            );
          }
          break;
        }

        case "alias":
          symbols.push(
            createAlias(
              decl.name,
              decl.target.kind === "single"
                ? resolve(decl.target.target)
                : decl.target.members.map(resolve),
              { module: localModule, location: decl.location }
            )
          );
          break;
      }
    }

    bindings.push(...collectBindings(sourceFile, options.dynamicKeys));
  }

  return {
    symbols: [...symbols, ...foreign.values()],
    bindings,
    diagnostics,
  };
};

/**
 * Read source files from disk and extract them together
 */
export const extractFromFiles = (
  filePaths: readonly string[],
  options: ExtractOptions = {}
): Result<Extraction, readonly Diagnostic[]> => {
  const inputs: SourceInput[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const filePath of filePaths) {
    if (!fs.existsSync(filePath)) {
      diagnostics.push(
        createDiagnostic("LIN3002", "error", `Source file not found: ${filePath}`)
      );
      continue;
    }
    try {
      inputs.push({
        fileName: options.rootDir
          ? path.relative(options.rootDir, filePath)
          : filePath,
        content: fs.readFileSync(filePath, "utf-8"),
      });
    } catch (err) {
      diagnostics.push(
        createDiagnostic(
          "LIN3003",
          "error",
          `Failed to read source file ${filePath}: ${String(err)}`
        )
      );
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }
  return { ok: true, value: extractDeclarations(inputs, options) };
};
