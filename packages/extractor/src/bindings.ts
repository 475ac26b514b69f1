/**
 * Dynamic binding collector
 *
 * Records string-keyed values: object literal properties
 * (`{ screen_name: "ProfileScreen" }`) and element assignments
 * (`config["screen_name"] = name`). The value is kept only when it is a
 * string literal.
 */

import * as ts from "typescript";
import type { DynamicBinding } from "@lineage/engine";
import { formatSiteId, getLocation } from "./location.js";

const literalOf = (expr: ts.Expression): string | undefined => {
  if (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) {
    return expr.text;
  }
  if (
    ts.isParenthesizedExpression(expr) ||
    ts.isAsExpression(expr) ||
    ts.isSatisfiesExpression(expr)
  ) {
    return literalOf(expr.expression);
  }
  return undefined;
};

const keyOf = (name: ts.PropertyName): string | undefined =>
  ts.isIdentifier(name) || ts.isStringLiteral(name) ? name.text : undefined;

export const collectBindings = (
  sourceFile: ts.SourceFile,
  keys?: readonly string[]
): readonly DynamicBinding[] => {
  const bindings: DynamicBinding[] = [];

  const record = (
    key: string,
    value: string | undefined,
    site: ts.Node
  ): void => {
    if (keys && !keys.includes(key)) {
      return;
    }
    const siteId = formatSiteId(getLocation(site, sourceFile));
    bindings.push(
      value === undefined ? { key, siteId } : { key, literalValue: value, siteId }
    );
  };

  const visitor = (node: ts.Node): void => {
    if (ts.isPropertyAssignment(node)) {
      const key = keyOf(node.name);
      if (key !== undefined) {
        record(key, literalOf(node.initializer), node.name);
      }
    } else if (ts.isShorthandPropertyAssignment(node)) {
      record(node.name.text, undefined, node.name);
    } else if (
      ts.isBinaryExpression(node) &&
      node.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
      ts.isElementAccessExpression(node.left)
    ) {
      const argument = node.left.argumentExpression;
      const key = literalOf(argument);
      if (key !== undefined) {
        record(key, literalOf(node.right), node.left);
      }
    }

    ts.forEachChild(node, visitor);
  };

  visitor(sourceFile);
  return bindings;
};
