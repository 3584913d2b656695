/**
 * Power sets.
 *
 * Every subset of a finite type, as `ReadonlySet`s whose members are inserted
 * in the base type's enumeration order. Subsets are ordered lexicographically
 * by their members' positions: the empty set, then every subset whose first
 * member is the first base value (recursively), then those starting at the
 * second base value, and so on.
 *
 * ```typescript
 * enumerate(powerSet(boolean));
 * // [Set {}, Set { false }, Set { false, true }, Set { true }]
 * ```
 *
 * The cardinality is `2 ^ |A|`. It grows quickly: check it with
 * `enumerateBelow` before listing the power set of anything larger than a
 * few dozen values.
 */

import { ONE, ZERO, powerOfTwo } from "./cardinality.js";
import { enumerableFrom, type Enumerable } from "./enumerable.js";

function* subsetsFrom<A>(
  base: readonly A[],
  start: number,
  prefix: A[],
): Generator<ReadonlySet<A>, void, undefined> {
  yield new Set(prefix);
  for (let i = start; i < base.length; i++) {
    prefix.push(base[i]);
    yield* subsetsFrom(base, i + 1, prefix);
    prefix.pop();
  }
}

/**
 * The subset at `index`. Subsets starting at base position `j` (with `n` base
 * values) form a block of `2 ^ (n - j - 1)`, so the walk skips whole blocks
 * and fetches only the members it keeps.
 */
function unrank<A>(base: Enumerable<A>, size: bigint, index: bigint): ReadonlySet<A> {
  const members = new Set<A>();
  let remaining = index;
  let position = ZERO;
  while (remaining > ZERO) {
    remaining -= ONE;
    let block = powerOfTwo(size - position - ONE);
    while (remaining >= block) {
      remaining -= block;
      position += ONE;
      block = powerOfTwo(size - position - ONE);
    }
    members.add(base.at(position));
    position += ONE;
  }
  return members;
}

export function powerSet<A>(base: Enumerable<A>): Enumerable<ReadonlySet<A>> {
  return enumerableFrom({
    typeName: `Set<${base.typeName}>`,
    values: () => subsetsFrom(base.enumerated(), 0, []),
    cardinality: () => powerOfTwo(base.cardinality()),
    at: (index) => unrank(base, base.cardinality(), index),
  });
}
