/**
 * Import scope - maps names bound by import declarations to their modules
 */

import * as ts from "typescript";

export type ImportedName = {
  readonly specifier: string;
  /** Name the module exports it under */
  readonly exportedName: string;
};

export type ImportScope = {
  readonly names: ReadonlyMap<string, ImportedName>;
  /** Namespace and default imports, usable as `Qualifier.Name` */
  readonly namespaces: ReadonlyMap<string, string>;
};

/**
 * Package imports name foreign modules; relative and absolute paths point
 * back into the sources being scanned.
 */
export const isExternalSpecifier = (specifier: string): boolean =>
  !specifier.startsWith(".") && !specifier.startsWith("/");

export const collectImports = (sourceFile: ts.SourceFile): ImportScope => {
  const names = new Map<string, ImportedName>();
  const namespaces = new Map<string, string>();

  for (const stmt of sourceFile.statements) {
    if (
      !ts.isImportDeclaration(stmt) ||
      !ts.isStringLiteral(stmt.moduleSpecifier) ||
      !stmt.importClause
    ) {
      continue;
    }

    const specifier = stmt.moduleSpecifier.text;
    const clause = stmt.importClause;

    if (clause.name) {
      names.set(clause.name.text, {
        specifier,
        exportedName: clause.name.text,
      });
      namespaces.set(clause.name.text, specifier);
    }

    const bindings = clause.namedBindings;
    if (bindings && ts.isNamespaceImport(bindings)) {
      namespaces.set(bindings.name.text, specifier);
    } else if (bindings && ts.isNamedImports(bindings)) {
      for (const element of bindings.elements) {
        names.set(element.name.text, {
          specifier,
          exportedName: element.propertyName?.text ?? element.name.text,
        });
      }
    }
  }

  return { names, namespaces };
};
