/**
 * Large Instances
 *
 * Types that are finite but far too large to list. Each one is a
 * `LargeEnumerable`: it can be counted, indexed, sampled and passed to
 * `enumerateBelow`, but `enumerate` does not accept it.
 *
 * ```typescript
 * import { cardinality, enumerateBelow } from "@finitary/core";
 * import { int32 } from "@finitary/std/large";
 *
 * cardinality(int32);          // 4294967296n
 * enumerateBelow(int32, 1000); // { _tag: "Rejected", cardinality: 4294967296n }
 * enumerate(int32);            // does not compile
 * ```
 */

import {
  ONE,
  ZERO,
  boundedOrdinal,
  checkIndex,
  large,
  power,
  type Countable,
  type Enumerable,
  type LargeEnumerable,
} from "@finitary/core";
import {
  boundedInt32,
  boundedInt64,
  boundedUInt32,
  boundedUInt64,
  ordinalBigInt,
  ordinalNumber,
} from "./typeclasses/index.js";

export const int32: LargeEnumerable<number> = large(boundedOrdinal("Int32", boundedInt32, ordinalNumber));
export const uint32: LargeEnumerable<number> = large(boundedOrdinal("UInt32", boundedUInt32, ordinalNumber));
export const int64: LargeEnumerable<bigint> = large(boundedOrdinal("Int64", boundedInt64, ordinalBigInt));
export const uint64: LargeEnumerable<bigint> = large(boundedOrdinal("UInt64", boundedUInt64, ordinalBigInt));

// ============================================================================
// Function Spaces
// ============================================================================

/**
 * A total function from a finite domain, as its table. Keys are the domain's
 * values in enumeration order and are compared with `===`, so pass domain
 * values taken from the domain's own enumeration when the domain holds
 * objects.
 */
export type FunctionTable<A, B> = ReadonlyMap<A, B>;

/** Apply a function table. */
export function apply<A, B>(table: FunctionTable<A, B>, a: A): B {
  for (const [key, value] of table) {
    if (key === a) return value;
  }
  throw new RangeError(`${String(a)} is not in the domain of this function`);
}

/**
 * The table at `index`: the index written in base `|B|`, most significant
 * digit first, one digit per domain value.
 */
function tableAt<A, B>(domain: readonly A[], codomain: Countable<B>, base: bigint, index: bigint): FunctionTable<A, B> {
  const digits: bigint[] = new Array<bigint>(domain.length);
  let rest = index;
  for (let i = domain.length - 1; i >= 0; i--) {
    digits[i] = rest % base;
    rest /= base;
  }
  return new Map(domain.map((a, i) => [a, codomain.at(digits[i])] as const));
}

/**
 * Every function from `domain` to `codomain`, `|B| ^ |A|` of them. Tables are
 * ordered like tuples over the domain: the result for the last domain value
 * varies fastest.
 *
 * ```typescript
 * const fs = functions(boolean, ordering);
 * cardinality(fs);  // 9n
 * valueAt(fs, 1);   // Map { false => "LT", true => "EQ" }
 * ```
 */
export function functions<A, B>(
  domain: Enumerable<A>,
  codomain: Countable<B>,
): LargeEnumerable<FunctionTable<A, B>> {
  const typeName = `(a: ${domain.typeName}) => ${codomain.typeName}`;
  const size = (): bigint => power(codomain.cardinality(), domain.cardinality());

  return large({
    typeName,
    *values() {
      const points = domain.enumerated();
      const base = codomain.cardinality();
      const total = power(base, BigInt(points.length));
      for (let index = ZERO; index < total; index += ONE) {
        yield tableAt(points, codomain, base, index);
      }
    },
    cardinality: size,
    at: (index) => {
      checkIndex(typeName, index, size());
      return tableAt(domain.enumerated(), codomain, codomain.cardinality(), index);
    },
  });
}
