/**
 * Diagnostic catalog for markweave
 *
 * Every diagnostic the engine reports comes from a descriptor with a stable
 * code in the MW9001-9999 range, a default severity and a message template
 * with `{placeholders}`.
 *
 * @example
 * ```typescript
 * env.messager.report(MW9001, { kind: "method", signature: "com.example.Widget.render()" }, node);
 * ```
 */

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Instrumentation = "instrumentation",
  Environment = "environment",
  Configuration = "config",
}

export type DiagnosticSeverity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9001-9999 */
  readonly code: number;

  /** Default severity (can be overridden per-emit) */
  readonly severity: DiagnosticSeverity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation */
  readonly explanation: string;
}

/**
 * Interpolate a descriptor's message template.
 * Placeholders without an argument are left as written.
 */
export function formatDiagnosticMessage(
  descriptor: DiagnosticDescriptor,
  args: Record<string, string | number | undefined> = {}
): string {
  let message = descriptor.messageTemplate;
  for (const [key, value] of Object.entries(args)) {
    if (value === undefined) continue;
    message = message.split(`{${key}}`).join(String(value));
  }
  return message;
}

// ============================================================================
// Error Catalog: Instrumentation (9001-9049)
// ============================================================================

export const MW9001: DiagnosticDescriptor = {
  code: 9001,
  severity: "warning",
  category: DiagnosticCategory.Instrumentation,
  messageTemplate: "Usage of deprecated {kind} detected: {signature}",
  explanation: `A routine marked @deprecated was instrumented.

Every call to it now logs a warning and increments the deprecated-method
invocation counter at runtime. Remove the marker, or migrate callers and
delete the routine, to get rid of this warning.`,
};

export const MW9002: DiagnosticDescriptor = {
  code: 9002,
  severity: "warning",
  category: DiagnosticCategory.Instrumentation,
  messageTemplate: "Failed to instrument {signature}: {cause}",
  explanation: `The handler could not splice instrumentation into one marked routine.

Other marked routines in the same file were still processed. The routine
compiles unchanged.`,
};

// ============================================================================
// Error Catalog: Environment (9050-9099)
// ============================================================================

export const MW9050: DiagnosticDescriptor = {
  code: 9050,
  severity: "error",
  category: DiagnosticCategory.Environment,
  messageTemplate: "Processing environment unavailable: {reason}",
  explanation: `The transformer received a handle that is neither a markweave
ProcessingEnvironment nor a wrapper that can be unwrapped into one.

If a build tool wraps the environment, pass an unwrap strategy through the
transformer's \`wrapEnvironment\` option.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

const catalog = new Map<number, DiagnosticDescriptor>(
  [MW9001, MW9002, MW9050].map((d) => [d.code, d])
);

/** Look up a descriptor by its numeric code */
export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return catalog.get(code);
}

/** Render a code as it appears in messages, e.g. "MW9001" */
export function formatDiagnosticCode(code: number): string {
  return `MW${code}`;
}
