/**
 * Enumeration Error Types
 *
 * Only construction-time problems are errors. Size and deadline outcomes are
 * ordinary tagged results (see `guards.ts`).
 */

/** Reason codes for structural failures. */
export type StructuralErrorReason =
  | "recursive"
  | "duplicate"
  | "successor-cycle"
  | "invalid-bounds"
  | "empty";

/**
 * Base class for all enumeration errors.
 */
export class EnumerationError extends Error {
  constructor(
    message: string,
    readonly typeName: string,
  ) {
    super(message);
    this.name = "EnumerationError";
  }
}

/**
 * Thrown when a shape or primitive adapter cannot describe a finite,
 * duplicate-free enumeration.
 */
export class StructuralError extends EnumerationError {
  constructor(
    typeName: string,
    readonly reason: StructuralErrorReason,
    message: string,
    readonly path: readonly string[] = [],
  ) {
    super(message, typeName);
    this.name = "StructuralError";
  }
}
