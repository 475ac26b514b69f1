/**
 * Lineage Extractor - declaration graph input from TypeScript sources
 */

export * from "./types.js";
export {
  AMBIENT_MODULE,
  extractDeclarations,
  extractFromFiles,
  resolveWrittenName,
} from "./extract.js";
export { collectImports, isExternalSpecifier } from "./imports.js";
export type { ImportScope, ImportedName } from "./imports.js";
export { collectBindings } from "./bindings.js";
