/**
 * Declaration collector - classes, interfaces and type aliases of one file,
 * with heritage as written (names not yet resolved)
 */

import * as ts from "typescript";
import type { SourceLocation } from "@lineage/engine";
import type { WrittenName } from "./types.js";
import { getLocation } from "./location.js";

export type HeritageEntry =
  | { readonly kind: "name"; readonly written: WrittenName }
  | {
      readonly kind: "expression";
      readonly text: string;
      readonly location: SourceLocation;
    };

export type WrittenAliasTarget =
  | { readonly kind: "single"; readonly target: WrittenName }
  | { readonly kind: "composition"; readonly members: readonly WrittenName[] };

export type SourceDeclaration =
  | {
      readonly kind: "class";
      readonly name: string;
      readonly location: SourceLocation;
      readonly superclass?: HeritageEntry;
      readonly protocols: readonly HeritageEntry[];
    }
  | {
      readonly kind: "protocol";
      readonly name: string;
      readonly location: SourceLocation;
      readonly protocols: readonly HeritageEntry[];
    }
  | {
      readonly kind: "alias";
      readonly name: string;
      readonly location: SourceLocation;
      readonly target: WrittenAliasTarget;
    };

export const writtenNameOf = (
  node: ts.Expression | ts.EntityName
): WrittenName | undefined => {
  if (ts.isIdentifier(node)) {
    return { name: node.text };
  }
  if (ts.isPropertyAccessExpression(node) && ts.isIdentifier(node.expression)) {
    return { qualifier: node.expression.text, name: node.name.text };
  }
  if (ts.isQualifiedName(node) && ts.isIdentifier(node.left)) {
    return { qualifier: node.left.text, name: node.right.text };
  }
  return undefined;
};

const heritageOf = (
  type: ts.ExpressionWithTypeArguments,
  sourceFile: ts.SourceFile
): HeritageEntry => {
  const written = writtenNameOf(type.expression);
  if (written) {
    return { kind: "name", written };
  }
  return {
    kind: "expression",
    text: type.expression.getText(sourceFile),
    location: getLocation(type.expression, sourceFile),
  };
};

const heritageClause = (
  clauses: ts.NodeArray<ts.HeritageClause> | undefined,
  token: ts.SyntaxKind.ExtendsKeyword | ts.SyntaxKind.ImplementsKeyword,
  sourceFile: ts.SourceFile
): readonly HeritageEntry[] =>
  (clauses ?? [])
    .filter((clause) => clause.token === token)
    .flatMap((clause) => clause.types.map((type) => heritageOf(type, sourceFile)));

/**
 * Alias target when the aliased type is a reference or an intersection of
 * references. Any other shape (unions, object types, type parameters) is
 * not part of the heritage graph.
 */
const aliasTargetOf = (
  node: ts.TypeAliasDeclaration
): WrittenAliasTarget | undefined => {
  const typeParameters = new Set(
    (node.typeParameters ?? []).map((param) => param.name.text)
  );

  const referenceOf = (type: ts.TypeNode): WrittenName | undefined => {
    if (ts.isParenthesizedTypeNode(type)) {
      return referenceOf(type.type);
    }
    if (!ts.isTypeReferenceNode(type)) {
      return undefined;
    }
    const written = writtenNameOf(type.typeName);
    if (!written || (!written.qualifier && typeParameters.has(written.name))) {
      return undefined;
    }
    return written;
  };

  if (ts.isIntersectionTypeNode(node.type)) {
    const members: WrittenName[] = [];
    for (const member of node.type.types) {
      const written = referenceOf(member);
      if (!written) {
        return undefined;
      }
      members.push(written);
    }
    return { kind: "composition", members };
  }

  const target = referenceOf(node.type);
  return target ? { kind: "single", target } : undefined;
};

export const collectDeclarations = (
  sourceFile: ts.SourceFile
): readonly SourceDeclaration[] => {
  const declarations: SourceDeclaration[] = [];

  for (const stmt of sourceFile.statements) {
    if (ts.isClassDeclaration(stmt) && stmt.name) {
      const [superclass] = heritageClause(
        stmt.heritageClauses,
        ts.SyntaxKind.ExtendsKeyword,
        sourceFile
      );
      declarations.push({
        kind: "class",
        name: stmt.name.text,
        location: getLocation(stmt.name, sourceFile),
        superclass,
        protocols: heritageClause(
          stmt.heritageClauses,
          ts.SyntaxKind.ImplementsKeyword,
          sourceFile
        ),
      });
    } else if (ts.isInterfaceDeclaration(stmt)) {
      declarations.push({
        kind: "protocol",
        name: stmt.name.text,
        location: getLocation(stmt.name, sourceFile),
        protocols: heritageClause(
          stmt.heritageClauses,
          ts.SyntaxKind.ExtendsKeyword,
          sourceFile
        ),
      });
    } else if (ts.isTypeAliasDeclaration(stmt)) {
      const target = aliasTargetOf(stmt);
      if (target) {
        declarations.push({
          kind: "alias",
          name: stmt.name.text,
          location: getLocation(stmt.name, sourceFile),
          target,
        });
      }
    }
  }

  return declarations;
};
