/**
 * Generic Derivation
 *
 * Bridges a concrete type and its shape. Define the shape once, supply a
 * `Generic<T, Rep>` that converts between `T` and the shape's representation
 * values, and `derive` produces the whole `Enumerable<T>`:
 *
 * ```typescript
 * interface Cell { open: boolean; order: Ordering }
 *
 * const CellShape = Shape.product(Shape.leaf(boolean), Shape.leaf(ordering));
 * const Cell = derive("Cell", CellShape, {
 *   to: (c) => [c.open, c.order] as const,
 *   from: ([open, order]) => ({ open, order }),
 * });
 * ```
 *
 * The n-ary helpers at the bottom convert between flat field lists or
 * constructor indices and the right-nested `Product`/`Sum` values built by
 * `Shape.products` and `Shape.sums`.
 */

import { assertFinite, cardinalityOfShape, indexShape, iterateShape } from "./engine.js";
import { enumerableFrom, type Enumerable } from "./enumerable.js";
import { log } from "./log.js";
import { UNIT, isLeft, left, right, type Either, type Shape } from "./shape.js";

// ============================================================================
// Generic Typeclass
// ============================================================================

/**
 * Converts between a type and its structural representation.
 */
export interface Generic<T, R> {
  /** Convert from the original type to its generic representation */
  to(value: T): R;
  /** Convert from the generic representation back to the original type */
  from(rep: R): T;
}

export function identity<R>(): Generic<R, R> {
  return { to: (value) => value, from: (rep) => rep };
}

// ============================================================================
// Derivation
// ============================================================================

/**
 * The engine yields `unknown`; `Shape<R>` was built by the smart constructors,
 * which keep `R` equal to what the engine yields for that node.
 */
function reify<R>(_shape: Shape<R>, value: unknown): R {
  return value as R;
}

/**
 * Derive enumeration and cardinality for `T` from a shape.
 *
 * Self-reference through `Shape.defer` is rejected here, before any value is
 * produced.
 *
 * @throws StructuralError when the shape is recursive
 */
export function derive<T, R>(typeName: string, shape: Shape<R>, iso: Generic<T, R>): Enumerable<T> {
  const node = shape.node;
  assertFinite(node, typeName);
  log.debug(`derived ${typeName}`);

  return enumerableFrom({
    typeName,
    *values() {
      for (const rep of iterateShape(node)) {
        yield iso.from(reify(shape, rep));
      }
    },
    cardinality: () => cardinalityOfShape(node),
    at: (index) => iso.from(reify(shape, indexShape(node, index))),
  });
}

/** Derive an enumerable whose values are the shape's own representation. */
export function deriveShape<R>(typeName: string, shape: Shape<R>): Enumerable<R> {
  return derive(typeName, shape, identity<R>());
}

// ============================================================================
// N-ary Representation Helpers
// ============================================================================

function isPair(value: unknown): value is readonly [unknown, unknown] {
  return Array.isArray(value) && value.length === 2;
}

/**
 * Build the right-nested product value for `components`.
 * Inverse of {@link flattenProduct}.
 */
export function nestProduct(components: readonly unknown[]): unknown {
  if (components.length === 0) return UNIT;
  let acc = components[components.length - 1];
  for (let i = components.length - 2; i >= 0; i--) {
    acc = [components[i], acc] as const;
  }
  return acc;
}

/**
 * Split a right-nested product value built by `Shape.products` into its
 * `arity` components.
 */
export function flattenProduct(rep: unknown, arity: number): unknown[] {
  if (arity === 0) return [];
  const out: unknown[] = [];
  let current = rep;
  for (let i = 0; i < arity - 1; i++) {
    if (!isPair(current)) {
      throw new TypeError(`expected a product of ${arity} components`);
    }
    out.push(current[0]);
    current = current[1];
  }
  out.push(current);
  return out;
}

/**
 * Inject `value` as constructor `index` of a right-nested sum of `arity`
 * constructors. Inverse of {@link projectSum}.
 */
export function injectSum(index: number, arity: number, value: unknown): unknown {
  let acc: unknown = index === arity - 1 ? value : left(value);
  for (let i = 0; i < Math.min(index, arity - 1); i++) {
    acc = right(acc);
  }
  return acc;
}

function isEither(value: unknown): value is Either<unknown, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    (value._tag === "Left" || value._tag === "Right")
  );
}

/**
 * Find which of `arity` constructors a right-nested sum value built by
 * `Shape.sums` holds, and its payload.
 */
export function projectSum(rep: unknown, arity: number): { index: number; value: unknown } {
  let current = rep;
  for (let index = 0; index < arity - 1; index++) {
    if (!isEither(current)) {
      throw new TypeError(`expected a sum of ${arity} constructors`);
    }
    if (isLeft(current)) return { index, value: current.left };
    current = current.right;
  }
  return { index: arity - 1, value: current };
}

