/**
 * Diagnostic types for the archive-with compiler
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Directive syntax (AW1001-AW1099) - halt the enclosing type
  | "AW1001" // Malformed directive
  | "AW1002" // Duplicate field name
  | "AW1003" // Mirror member without a declared type
  // Table validation (AW2001-AW2099) - fatal for the enclosing type
  | "AW2001" // MissingRemoteType
  | "AW2002" // GetterOwnedWithoutGetter
  | "AW2003" // AmbiguousConversion
  | "AW2004" // DuplicateRemoteType
  | "AW2005" // UnresolvedNestedMirror
  // Emission notes (AW3001-AW3099) - never errors
  | "AW3001"; // NotReconstructable

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
  /** Mirror type the diagnostic is attached to */
  readonly typeName?: string;
  /** Field within `typeName`, when the diagnostic is field-scoped */
  readonly fieldName?: string;
};

/**
 * Where a diagnostic points inside the mirror declarations.
 */
export type DiagnosticTarget = {
  readonly location?: SourceLocation;
  readonly typeName?: string;
  readonly fieldName?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  target: DiagnosticTarget = {},
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location: target.location,
  hint,
  typeName: target.typeName,
  fieldName: target.fieldName,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

const formatSubject = (diagnostic: Diagnostic): string | undefined => {
  if (!diagnostic.typeName) return undefined;
  return diagnostic.fieldName
    ? `[${diagnostic.typeName}.${diagnostic.fieldName}]`
    : `[${diagnostic.typeName}]`;
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);

  const subject = formatSubject(diagnostic);
  if (subject) {
    parts.push(subject);
  }

  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const addDiagnostics = (
  collector: DiagnosticsCollector,
  diagnostics: readonly Diagnostic[]
): DiagnosticsCollector => diagnostics.reduce(addDiagnostic, collector);
