/**
 * Cardinality arithmetic.
 *
 * Counts are always `bigint`: a product or power set of modest types already
 * exceeds `Number.MAX_SAFE_INTEGER`, and a bounded type whose ordinal range is
 * as wide as the accumulator would wrap if `max - min` were taken first.
 */

/** Number of distinct values of a type. Never negative. */
export type Cardinality = bigint;

/** Anything a caller may pass where a cardinality limit is expected. */
export type CardinalityLike = bigint | number;

export const ZERO: Cardinality = 0n;
export const ONE: Cardinality = 1n;

/**
 * Widen a caller-supplied limit to a `Cardinality`.
 * Non-integral numbers round up, so `2.5` admits cardinalities up to 2.
 */
export function toCardinality(n: CardinalityLike): Cardinality {
  if (typeof n === "bigint") return n;
  if (Number.isNaN(n)) {
    throw new RangeError("cardinality limit is NaN");
  }
  if (n === Number.POSITIVE_INFINITY) {
    throw new RangeError("cardinality limit must be finite; pass a bigint for very large limits");
  }
  return BigInt(Math.ceil(n));
}

export function sum(a: Cardinality, b: Cardinality): Cardinality {
  return a + b;
}

export function product(a: Cardinality, b: Cardinality): Cardinality {
  return a * b;
}

/** `2 ^ n`, the size of a power set. */
export function powerOfTwo(n: Cardinality): Cardinality {
  return 1n << n;
}

/** `base ^ exponent`, the size of a function space. */
export function power(base: Cardinality, exponent: Cardinality): Cardinality {
  return base ** exponent;
}

/**
 * Inclusive ordinal range size, `1 + hi - lo`.
 * Returns 0 for an empty range.
 */
export function ordinalRange(lo: bigint, hi: bigint): Cardinality {
  return hi < lo ? ZERO : ONE + hi - lo;
}

/** The cardinality of a materialized sequence. */
export function lengthOf(values: readonly unknown[]): Cardinality {
  return BigInt(values.length);
}

/**
 * Convert a position to an array index, or `undefined` if it falls outside
 * `0 <= index < size`.
 */
export function toIndex(index: bigint, size: Cardinality): number | undefined {
  if (index < ZERO || index >= size) return undefined;
  return Number(index);
}
