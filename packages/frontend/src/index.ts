/**
 * dispatchgen frontend - registry loading and dispatch model building
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  fault,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";
export * from "./types/result.js";

export * from "./registry/types.js";
export {
  parseRegistry,
  loadRegistryFile,
  targetNameOf,
} from "./registry/loader.js";

export * from "./model/index.js";
export * from "./pipeline.js";
