/**
 * Primitive Adapters
 *
 * Three ways to make an atomic finite type enumerable, depending on the
 * structure it already has:
 *
 * - {@link boundedOrdinal}: a minimum, a maximum and a gap-free ordinal
 *   numbering. Fast `cardinality` and `at`.
 * - {@link successorFrom}: a starting value and a step function. Cardinality
 *   is the length of the walk.
 * - {@link literals}: an explicit list, for domains with no ordinal structure.
 *
 * Every adapter yields each value exactly once and reports a cardinality
 * equal to the number of values.
 */

import { ordinalRange, type Cardinality } from "./cardinality.js";
import { enumerableFrom, type Enumerable } from "./enumerable.js";
import { StructuralError } from "./errors.js";

// ============================================================================
// Typeclasses
// ============================================================================

/**
 * Types with minimum and maximum values.
 */
export interface Bounded<A> {
  minBound(): A;
  maxBound(): A;
}

/**
 * A gap-free numbering of a type's values. Ordinals are `bigint` so the width
 * of the numbered type never limits the arithmetic.
 */
export interface Ordinal<A> {
  toOrdinal(a: A): bigint;
  fromOrdinal(n: bigint): A;
}

/**
 * Types with successors and predecessors, convertible to/from integers.
 * For types whose numbering fits in a `number`.
 */
export interface Enum<A> {
  succ(a: A): A;
  pred(a: A): A;
  toEnum(n: number): A;
  fromEnum(a: A): number;
}

/**
 * A starting value and a step. `succ` returns `undefined` past the last value,
 * so `undefined` itself cannot be a value of the type.
 */
export interface Successor<A> {
  readonly zero: A;
  succ(a: A): A | undefined;
}

// ============================================================================
// Bounded-Ordinal
// ============================================================================

/**
 * Enumerate `minBound..maxBound` through the ordinal numbering.
 *
 * ```typescript
 * const int8 = boundedOrdinal("Int8",
 *   { minBound: () => -128, maxBound: () => 127 },
 *   { toOrdinal: BigInt, fromOrdinal: Number });
 * cardinality(int8); // 256n
 * ```
 *
 * @throws StructuralError with reason `"invalid-bounds"` when `maxBound` precedes `minBound`
 */
export function boundedOrdinal<A>(
  typeName: string,
  bounded: Bounded<A>,
  ordinal: Ordinal<A>,
): Enumerable<A> {
  const lo = ordinal.toOrdinal(bounded.minBound());
  const hi = ordinal.toOrdinal(bounded.maxBound());
  if (hi < lo) {
    throw new StructuralError(
      typeName,
      "invalid-bounds",
      `${typeName}: maxBound (ordinal ${hi}) precedes minBound (ordinal ${lo})`,
    );
  }

  return enumerableFrom({
    typeName,
    *values() {
      for (let n = lo; n <= hi; n++) {
        yield ordinal.fromOrdinal(n);
      }
    },
    cardinality: (): Cardinality => ordinalRange(lo, hi),
    at: (index) => ordinal.fromOrdinal(lo + index),
  });
}

/**
 * Adapt a `Bounded` + `Enum` pair.
 */
export function fromBoundedEnum<A>(typeName: string, bounded: Bounded<A>, E: Enum<A>): Enumerable<A> {
  return boundedOrdinal(typeName, bounded, {
    toOrdinal: (a) => BigInt(E.fromEnum(a)),
    fromOrdinal: (n) => E.toEnum(Number(n)),
  });
}

// ============================================================================
// Successor-From-Zero
// ============================================================================

/**
 * Enumerate by stepping from `zero` until `succ` returns `undefined`.
 *
 * The walk is taken once, on first use, and kept. A step that returns to an
 * earlier value is reported instead of looping forever.
 *
 * @throws StructuralError with reason `"successor-cycle"` on first use when the steps revisit a value
 */
export function successorFrom<A>(typeName: string, successor: Successor<A>): Enumerable<A> {
  let walked: readonly A[] | undefined;

  const walk = (): readonly A[] => {
    if (walked) return walked;
    const seen = new Set<A>();
    const out: A[] = [];
    let current: A | undefined = successor.zero;
    while (current !== undefined) {
      if (seen.has(current)) {
        throw new StructuralError(
          typeName,
          "successor-cycle",
          `${typeName}: successor returned to ${String(current)} after ${out.length} steps`,
        );
      }
      seen.add(current);
      out.push(current);
      current = successor.succ(current);
    }
    walked = out;
    return out;
  };

  return enumerableFrom({
    typeName,
    values: () => walk(),
    cardinality: () => BigInt(walk().length),
    at: (index) => walk()[Number(index)],
  });
}

// ============================================================================
// Literal List
// ============================================================================

/**
 * Enumerate exactly `values`, in the given order.
 *
 * ```typescript
 * const seekMode = literals("SeekMode", ["absolute", "relative", "fromEnd"] as const);
 * ```
 *
 * @throws StructuralError with reason `"duplicate"` when a value is listed twice
 */
export function literals<const A>(typeName: string, values: readonly A[]): Enumerable<A> {
  const list = Object.freeze([...values]);
  const seen = new Set<A>();
  for (const value of list) {
    if (seen.has(value)) {
      throw new StructuralError(typeName, "duplicate", `${typeName}: ${String(value)} is listed twice`);
    }
    seen.add(value);
  }

  return enumerableFrom({
    typeName,
    values: () => list,
    cardinality: () => BigInt(list.length),
    at: (index) => list[Number(index)],
  });
}
