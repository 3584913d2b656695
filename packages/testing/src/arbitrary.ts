import fc from "fast-check";
import { StructuralError, type Countable } from "@finitary/core";

/**
 * A fast-check `Arbitrary` over every value of `E`, drawn by index.
 *
 * Works for large instances too: only `cardinality()` and `at(i)` are used,
 * so nothing is listed. Shrinking moves towards index 0, the first value in
 * enumeration order.
 *
 * ```typescript
 * import { it } from "@fast-check/vitest";
 *
 * it.prop([arbitraryOf(int32)])("round-trips", (n) => { ... });
 * ```
 *
 * @throws StructuralError with reason `"empty"` when `E` has no values
 */
export function arbitraryOf<A>(E: Countable<A>): fc.Arbitrary<A> {
  const size = E.cardinality();
  if (size === 0n) {
    throw new StructuralError(E.typeName, "empty", `${E.typeName} has no values to draw from`);
  }
  return fc.bigInt({ min: 0n, max: size - 1n }).map((index) => E.at(index));
}
