/**
 * Diagnostics for finitary-derive
 *
 * Every problem the shape builder reports has an entry in the catalog below:
 * a stable code, a severity and a message template with `{placeholders}`.
 *
 * @example
 * ```typescript
 * createDiagnostic(FIN7001, { type: "string" }, "cell.ts", { line: 3, column: 9 });
 * // { code: 7001, severity: "error", message: "`string` has infinitely many values", ... }
 * ```
 */

import type { SourcePosition } from "./model.js";

// ============================================================================
// Diagnostic Descriptor (Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  readonly code: number;
  readonly severity: "error" | "warning";
  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;
}

export interface Diagnostic {
  readonly code: number;
  readonly severity: "error" | "warning";
  readonly message: string;
  readonly file: string;
  readonly line: number;
  readonly column: number;
}

// ============================================================================
// Catalog
// ============================================================================

export const FIN7001: DiagnosticDescriptor = {
  code: 7001,
  severity: "error",
  messageTemplate: "`{type}` has infinitely many values",
};

export const FIN7002: DiagnosticDescriptor = {
  code: 7002,
  severity: "error",
  messageTemplate: "`{name}` is recursive ({path}); recursive types have no finite enumeration",
};

export const FIN7003: DiagnosticDescriptor = {
  code: 7003,
  severity: "error",
  messageTemplate: "`{name}` is neither declared in this file nor a catalog type",
};

export const FIN7004: DiagnosticDescriptor = {
  code: 7004,
  severity: "error",
  messageTemplate: "unsupported type syntax: {detail}",
};

export const FIN7005: DiagnosticDescriptor = {
  code: 7005,
  severity: "warning",
  messageTemplate: "`{name}` is not exported; the generated module cannot import it",
};

export const FIN7006: DiagnosticDescriptor = {
  code: 7006,
  severity: "error",
  messageTemplate: "{what} appears more than once in `{type}`",
};

// ============================================================================
// Construction and Rendering
// ============================================================================

function interpolate(template: string, args: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => args[key] ?? match);
}

export function createDiagnostic(
  descriptor: DiagnosticDescriptor,
  args: Readonly<Record<string, string>>,
  file: string,
  position: SourcePosition,
): Diagnostic {
  return {
    code: descriptor.code,
    severity: descriptor.severity,
    message: interpolate(descriptor.messageTemplate, args),
    file,
    line: position.line,
    column: position.column,
  };
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}

/**
 * Render a diagnostic for a terminal:
 *
 * ```
 * error[FIN7001]: `string` has infinitely many values
 *   --> cell.ts:3:9
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return (
    `${diagnostic.severity}[FIN${diagnostic.code}]: ${diagnostic.message}\n` +
    `  --> ${diagnostic.file}:${diagnostic.line}:${diagnostic.column}`
  );
}
