/**
 * Diagnostic types for lineage
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Resolution errors (LIN1001-LIN1099)
  | "LIN1001" // Duplicate symbol
  | "LIN1002" // Cyclic alias
  | "LIN1003" // Cyclic inheritance
  | "LIN1004" // Composition alias used as superclass
  | "LIN1005" // Symbol is not a class
  | "LIN1006" // Reference to an undeclared local symbol
  | "LIN1007" // Symbol kind does not fit its position
  | "LIN1008" // Malformed declaration
  // Dynamic reference findings (LIN2001-LIN2099)
  | "LIN2001" // Dynamic reference could not be resolved statically
  | "LIN2002" // Dynamic reference matches several modules
  // Source extraction (LIN3001-LIN3099)
  | "LIN3001" // Heritage clause is not a plain type reference
  | "LIN3002" // Source file not found
  | "LIN3003" // Failed to read source file
  | "LIN3004" // Input is neither a graph file nor a TypeScript source
  // Graph file loading errors (LIN9001-LIN9015)
  | "LIN9001" // Graph file not found
  | "LIN9002" // Failed to read graph file
  | "LIN9003" // Invalid JSON in graph file
  | "LIN9004" // Graph file must be an object
  | "LIN9005" // Missing or invalid 'symbols' field
  | "LIN9006" // Invalid symbol: must be an object
  | "LIN9007" // Invalid symbol: missing or invalid 'name'/'module'
  | "LIN9008" // Invalid symbol: 'kind' must be one of ...
  | "LIN9009" // Invalid symbol reference
  | "LIN9010" // Invalid alias target
  | "LIN9011" // Relationship not allowed for this kind
  | "LIN9012" // Opaque symbol declares relationships
  | "LIN9013" // Invalid 'bindings' field
  | "LIN9014" // Invalid binding
  | "LIN9015"; // Invalid 'localModule' field

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
