import * as ts from "typescript";
import type { SourceLocation } from "@lineage/engine";

/**
 * Get source location from TypeScript node
 */
export const getLocation = (
  node: ts.Node,
  sourceFile: ts.SourceFile
): SourceLocation => {
  const start = node.getStart(sourceFile);
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(start);
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getEnd() - start,
  };
};

export const formatSiteId = (location: SourceLocation): string =>
  `${location.file}:${location.line}:${location.column}`;
