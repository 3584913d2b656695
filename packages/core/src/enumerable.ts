/**
 * The Enumerable capability.
 *
 * Three interfaces split "how big" from "may be listed":
 *
 * - `Countable<A>`: knows its cardinality and can produce any value by index.
 * - `Enumerable<A>`: a `Countable` that is small enough to materialize.
 * - `LargeEnumerable<A>`: a `Countable` marked too large to list. It has no
 *   `enumerated()`, so handing one to {@link enumerate} does not compile.
 *
 * Laws for every `Enumerable<A>`:
 *
 * - Finite: `cardinality()` returns.
 * - Consistent: `cardinality() === BigInt(enumerated().length)`.
 * - Distinct: `enumerated()` contains no duplicates.
 * - Complete: every value of `A` is in `enumerated()`.
 * - Indexable: `at(i) === enumerated()[i]` for `0 <= i < cardinality()`;
 *   any other index is a `RangeError`.
 *
 * @example
 * ```typescript
 * import { enumerate, cardinality, record } from "@finitary/core";
 * import { boolean, ordering } from "@finitary/std";
 *
 * const Cell = record({ open: boolean, order: ordering });
 * cardinality(Cell); // 6n
 * enumerate(Cell)[0]; // { open: false, order: "LT" }
 * ```
 */

import { lengthOf, toIndex, type Cardinality } from "./cardinality.js";

/**
 * Validate a position against a cardinality and return it as an array index.
 * @throws RangeError when `index` is negative or not below `size`
 */
export function checkIndex(typeName: string, index: bigint, size: Cardinality): number {
  const i = toIndex(index, size);
  if (i === undefined) {
    throw new RangeError(`${typeName}: index ${index} is outside 0..${size - 1n}`);
  }
  return i;
}

// ============================================================================
// Capabilities
// ============================================================================

export interface Countable<A> {
  /** Display name used in logs and errors. */
  readonly typeName: string;

  /** Every value, lazily, in enumeration order. */
  values(): Iterable<A>;

  cardinality(): Cardinality;

  /** The value at a position of the enumeration. Throws `RangeError` out of range. */
  at(index: bigint): A;
}

export interface Enumerable<A> extends Countable<A> {
  /** Every value in enumeration order. A new array on each call. */
  enumerated(): readonly A[];
}

export interface LargeEnumerable<A> extends Countable<A> {
  readonly large: true;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Parts from which {@link enumerableFrom} assembles an instance. Supply a
 * closed-form `cardinality` and `at` whenever one exists; the fallbacks walk
 * the whole enumeration.
 */
export interface EnumerableParts<A> {
  readonly typeName: string;
  values(): Iterable<A>;
  cardinality?(): Cardinality;
  /** Called only with `0 <= index < cardinality()`. */
  at?(index: bigint): A;
}

export function enumerableFrom<A>(parts: EnumerableParts<A>): Enumerable<A> {
  const enumerated = (): readonly A[] => Array.from(parts.values());
  const cardinality = parts.cardinality
    ? parts.cardinality.bind(parts)
    : (): Cardinality => lengthOf(enumerated());
  const at = (index: bigint): A => {
    if (parts.at) {
      checkIndex(parts.typeName, index, cardinality());
      return parts.at(index);
    }
    const all = enumerated();
    const i = checkIndex(parts.typeName, index, lengthOf(all));
    return all[i];
  };

  return {
    typeName: parts.typeName,
    values: () => parts.values(),
    enumerated,
    cardinality,
    at,
  };
}

/**
 * Mark a countable type as too large to list. Only the index-based and
 * size-checked entry points accept the result.
 */
export function large<A>(parts: Countable<A>): LargeEnumerable<A> {
  return {
    typeName: parts.typeName,
    values: () => parts.values(),
    cardinality: () => parts.cardinality(),
    at: (index) => parts.at(index),
    large: true,
  };
}

/**
 * Opt back in to listing a large type. The caller takes responsibility for
 * the size; prefer `enumerateBelow`.
 */
export function unsafeEnumerable<A>(source: LargeEnumerable<A>): Enumerable<A> {
  return {
    typeName: source.typeName,
    values: () => source.values(),
    enumerated: () => Array.from(source.values()),
    cardinality: () => source.cardinality(),
    at: (index) => source.at(index),
  };
}

// ============================================================================
// Public API
// ============================================================================

/** Every value of the type, in structural order. */
export function enumerate<A>(E: Enumerable<A>): readonly A[] {
  return E.enumerated();
}

/** The number of values of the type, without listing them. */
export function cardinality<A>(E: Countable<A>): Cardinality {
  return E.cardinality();
}

/**
 * The value at a position of the enumeration, without listing the others.
 * @throws RangeError when `index` is not an integer in `0 <= index < cardinality`
 */
export function valueAt<A>(E: Countable<A>, index: bigint | number): A {
  if (typeof index === "number" && !Number.isInteger(index)) {
    throw new RangeError(`${E.typeName}: index ${index} is not an integer`);
  }
  return E.at(BigInt(index));
}
