/**
 * Exception kinds, printf format flags and the boolean monoid wrappers.
 */

import { imap, literals, type Enumerable } from "@finitary/core";
import { boolean } from "./primitives.js";

export type ArithException =
  | "overflow"
  | "underflow"
  | "lossOfPrecision"
  | "divideByZero"
  | "denormal"
  | "ratioZeroDenominator";

export const arithException: Enumerable<ArithException> = literals("ArithException", [
  "overflow",
  "underflow",
  "lossOfPrecision",
  "divideByZero",
  "denormal",
  "ratioZeroDenominator",
]);

export type AsyncException = "stackOverflow" | "heapOverflow" | "threadKilled" | "userInterrupt";

export const asyncException: Enumerable<AsyncException> = literals("AsyncException", [
  "stackOverflow",
  "heapOverflow",
  "threadKilled",
  "userInterrupt",
]);

export type FormatAdjustment = "leftAdjust" | "zeroPad";

export const formatAdjustment: Enumerable<FormatAdjustment> = literals("FormatAdjustment", [
  "leftAdjust",
  "zeroPad",
]);

export type FormatSign = "signPlus" | "signSpace";

export const formatSign: Enumerable<FormatSign> = literals("FormatSign", ["signPlus", "signSpace"]);

// ============================================================================
// Boolean Monoids
// ============================================================================

/** Boolean under conjunction. */
export interface All {
  readonly all: boolean;
}

/** Boolean under disjunction. */
export interface Any {
  readonly any: boolean;
}

export const all: Enumerable<All> = imap(
  boolean,
  "All",
  (value): All => ({ all: value }),
  (wrapped) => wrapped.all,
);

export const any: Enumerable<Any> = imap(
  boolean,
  "Any",
  (value): Any => ({ any: value }),
  (wrapped) => wrapped.any,
);
