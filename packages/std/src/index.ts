/**
 * @finitary/std: the primitive catalog
 *
 * Ready-made enumerable instances for the primitive finite types:
 *
 * - `unit`, `never`, `boolean`, `ordering`
 * - `int8`, `uint8`, `int16`, `uint16`, `char`, `generalCategory`
 * - `all`, `any` (boolean monoid wrappers)
 * - I/O settings: `ioMode`, `seekMode`, `newline`, `newlineMode`,
 *   `bufferEncoding`, `bufferState`, `ioDeviceType`, `codingFailureMode`,
 *   `codingProgress`
 * - `arithException`, `asyncException`, `formatAdjustment`, `formatSign`
 *
 * Types too large to list (`int32`, `int64`, function spaces) live in
 * `@finitary/std/large`.
 *
 * @example
 * ```ts
 * import { cardinality, enumerate, tuple } from "@finitary/core";
 * import { boolean, ordering } from "@finitary/std";
 *
 * cardinality(tuple(boolean, ordering)); // 6n
 * enumerate(ordering);                   // ["LT", "EQ", "GT"]
 * ```
 */

// Instances
export * from "./instances/index.js";

// Typeclass instances behind them
export * from "./typeclasses/index.js";
