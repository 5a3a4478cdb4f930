/**
 * archive-with frontend - directives, field mapping IR and validation
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticTarget,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  addDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/type-path.js";

export * from "./directives/types.js";
export { parseDirectiveModel } from "./directives/parser.js";
export { tokenizeDirectiveText } from "./directives/tokenizer.js";

export * from "./ir/types.js";
export { buildFieldMappingTable } from "./ir/builder.js";

export * from "./validation/index.js";

export * from "./pipeline.js";

export * from "./source/types.js";
export { extractTypeDecls, DIRECTIVE_TAG } from "./source/extractor.js";
