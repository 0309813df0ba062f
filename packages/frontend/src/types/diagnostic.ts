/**
 * Diagnostic types for the dispatch generator
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Registry input (DGN1001-DGN1099)
  | "DGN1001" // Registry file not found
  | "DGN1002" // Failed to read registry file
  | "DGN1003" // Malformed registry XML
  | "DGN1004" // Registry element missing required attribute or child
  // Platform policy (DGN2001-DGN2099)
  | "DGN2001" // Unknown platform family
  | "DGN2002" // Malformed feature version number
  // Command table (DGN3001-DGN3099)
  | "DGN3001" // Duplicate command name
  | "DGN3002" // Reference to an undeclared command
  // Aliases (DGN4001-DGN4099)
  | "DGN4001" // Alias chain does not terminate
  // Providers (DGN5001-DGN5099)
  | "DGN5001" // Provider label bound to conflicting condition or loader
  | "DGN5002" // Provider labels collide on one identifier
  // Emission (DGN6001-DGN6099)
  | "DGN6001" // String table too large for 16-bit offsets
  | "DGN6002"; // GLhandleARB argument beyond the 6th register position

/**
 * Where in the registry a diagnostic originates.
 * `element` names the registry entity, e.g. `command glFoo`.
 */
export type SourceLocation = {
  readonly file: string;
  readonly element?: string;
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
      diagnostic.location.element
        ? `${diagnostic.location.file} (${diagnostic.location.element}):`
        : `${diagnostic.location.file}:`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

/**
 * Shorthand for the common case of a single fatal diagnostic.
 */
export const fault = (
  code: DiagnosticCode,
  message: string,
  location?: SourceLocation,
  hint?: string
): readonly Diagnostic[] => [
  createDiagnostic(code, "error", message, location, hint),
];
