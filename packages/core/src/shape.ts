/**
 * Shape Algebra
 *
 * The generic, structural representation of a finite type. A record is a
 * right-nested chain of `Product`s over its fields, a union is a right-nested
 * chain of `Sum`s over its constructors, and everything bottoms out in `Unit`,
 * `Void` or a `Leaf` holding an already-enumerable type.
 *
 * ```typescript
 * // interface Cell { open: boolean; order: Ordering }
 * Shape.labeled({ kind: "type", name: "Cell" },
 *   Shape.product(
 *     Shape.labeled({ kind: "field", name: "open" }, Shape.leaf(boolean)),
 *     Shape.labeled({ kind: "field", name: "order" }, Shape.leaf(ordering))));
 * ```
 *
 * `ShapeNode` is the closed union the engine recurses over. `Shape<A>` wraps a
 * node with the type of the values it describes; that type exists only at
 * compile time.
 */

import type { Enumerable } from "./enumerable.js";

// ============================================================================
// Representation Values
// ============================================================================

/** The single value of `Unit`. */
export type Unit = readonly [];

export const UNIT: Unit = Object.freeze([] as const);

export interface Left<L> {
  readonly _tag: "Left";
  readonly left: L;
}

export interface Right<R> {
  readonly _tag: "Right";
  readonly right: R;
}

/** Which side of a `Sum` a value came from. */
export type Either<L, R> = Left<L> | Right<R>;

export function left<L, R = never>(value: L): Either<L, R> {
  return { _tag: "Left", left: value };
}

export function right<R, L = never>(value: R): Either<L, R> {
  return { _tag: "Right", right: value };
}

export function isLeft<L, R>(either: Either<L, R>): either is Left<L> {
  return either._tag === "Left";
}

// ============================================================================
// Nodes
// ============================================================================

/** Metadata carried by a `Labeled` node. It never affects enumeration. */
export interface Label {
  readonly kind: "type" | "constructor" | "field";
  readonly name: string;
}

export interface UnitNode {
  readonly _tag: "Unit";
}

export interface VoidNode {
  readonly _tag: "Void";
}

export interface LeafNode {
  readonly _tag: "Leaf";
  readonly enumerable: Enumerable<unknown>;
}

export interface ProductNode {
  readonly _tag: "Product";
  readonly left: ShapeNode;
  readonly right: ShapeNode;
}

export interface SumNode {
  readonly _tag: "Sum";
  readonly left: ShapeNode;
  readonly right: ShapeNode;
}

export interface LabeledNode {
  readonly _tag: "Labeled";
  readonly label: Label;
  readonly shape: ShapeNode;
}

/**
 * A forward reference, for shapes that mention a declaration made later.
 * `force()` evaluates the thunk once.
 */
export interface DeferNode {
  readonly _tag: "Defer";
  readonly name: string;
  force(): ShapeNode;
}

export type ShapeNode =
  | UnitNode
  | VoidNode
  | LeafNode
  | ProductNode
  | SumNode
  | LabeledNode
  | DeferNode;

// ============================================================================
// Typed Shapes
// ============================================================================

/** Brand symbol carrying the representation type (type-only, never at runtime). */
declare const __rep__: unique symbol;

/**
 * A shape whose values have type `A`.
 *
 * The smart constructors below are the only intended way to build one; they
 * keep `A` in step with what the engine will produce for `node`.
 */
export interface Shape<A> {
  readonly node: ShapeNode;
  readonly [__rep__]?: A;
}

/** Extract the representation type of a shape. */
export type RepOf<S> = S extends Shape<infer A> ? A : never;

const UNIT_NODE: UnitNode = { _tag: "Unit" };
const VOID_NODE: VoidNode = { _tag: "Void" };

function unitShape(): Shape<Unit> {
  return { node: UNIT_NODE };
}

function voidShape(): Shape<never> {
  return { node: VOID_NODE };
}

function leaf<A>(enumerable: Enumerable<A>): Shape<A> {
  return { node: { _tag: "Leaf", enumerable } };
}

function product<L, R>(l: Shape<L>, r: Shape<R>): Shape<readonly [L, R]> {
  return { node: { _tag: "Product", left: l.node, right: r.node } };
}

function sum<L, R>(l: Shape<L>, r: Shape<R>): Shape<Either<L, R>> {
  return { node: { _tag: "Sum", left: l.node, right: r.node } };
}

function labeled<A>(label: Label, shape: Shape<A>): Shape<A> {
  return { node: { _tag: "Labeled", label, shape: shape.node } };
}

function defer<A>(name: string, thunk: () => Shape<A>): Shape<A> {
  let forced: ShapeNode | undefined;
  return {
    node: {
      _tag: "Defer",
      name,
      force: () => (forced ??= thunk().node),
    },
  };
}

// ============================================================================
// N-ary Chains
// ============================================================================

/**
 * Right-nested product of `shapes`: `[a, [b, c]]` for three components.
 * A single shape is returned as is; no shapes is `Unit`.
 */
function products(shapes: readonly Shape<unknown>[]): Shape<unknown> {
  if (shapes.length === 0) return unitShape();
  return shapes.reduceRight((acc, shape) => product(shape, acc));
}

/**
 * Right-nested sum of `shapes`: `Left(a) | Right(Left(b)) | Right(Right(c))`.
 * A single shape is returned as is; no shapes is `Void`.
 */
function sums(shapes: readonly Shape<unknown>[]): Shape<unknown> {
  if (shapes.length === 0) return voidShape();
  return shapes.reduceRight((acc, shape) => sum(shape, acc));
}

/** Labeled fields, in declaration order. */
function fields(entries: readonly (readonly [string, Shape<unknown>])[]): Shape<unknown> {
  return products(entries.map(([name, shape]) => labeled({ kind: "field", name }, shape)));
}

/** Labeled constructors, in declaration order. */
function constructors(entries: readonly (readonly [string, Shape<unknown>])[]): Shape<unknown> {
  return sums(entries.map(([name, shape]) => labeled({ kind: "constructor", name }, shape)));
}

/**
 * Shape builders.
 *
 * ```typescript
 * const Pair = Shape.product(Shape.leaf(boolean), Shape.leaf(ordering));
 * const Choice = Shape.sum(Shape.leaf(boolean), Shape.unit);
 * ```
 */
export const Shape = {
  unit: unitShape(),
  void: voidShape(),
  leaf,
  product,
  sum,
  labeled,
  defer,
  products,
  sums,
  fields,
  constructors,
} as const;
