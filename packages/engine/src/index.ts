/**
 * Lineage Engine - Declaration graph, heritage resolution and classification
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/symbol.js";
export * from "./types/errors.js";

export * from "./graph/declaration-graph.js";
export * from "./graph/loader.js";

export * from "./resolver/alias-resolver.js";
export * from "./resolver/type-resolver.js";
export * from "./resolver/dynamic-resolver.js";
export { ResolutionCache } from "./resolver/resolution-cache.js";

export * from "./query/classification-engine.js";

export * from "./rules/types.js";
export * from "./rules/classifier.js";
