/**
 * Combinators
 *
 * Enumerable instances for composite types, each derived from a shape:
 *
 * | Combinator           | Shape                                   | Cardinality |
 * | -------------------- | --------------------------------------- | ----------- |
 * | `unit`               | `Unit`                                  | 1           |
 * | `never`              | `Void`                                  | 0           |
 * | `either(L, R)`       | `Sum(L, R)`                             | `L + R`     |
 * | `option(A)`          | `Sum(Unit, A)`                          | `1 + A`     |
 * | `tuple(A, B, ...)`   | `Product(A, Product(B, ...))`           | `A * B ...` |
 * | `record({ a, b })`   | labeled fields, in key order            | `a * b ...` |
 * | `variants(d, {...})` | labeled constructors, in key order      | sum of each |
 * | `oneOf(A, B, ...)`   | `Sum(A, Sum(B, ...))`                   | `A + B ...` |
 * | `imap(A, ...)`       | `Leaf(A)` through an isomorphism        | `A`         |
 */

import type { Countable, Enumerable } from "./enumerable.js";
import {
  derive,
  deriveShape,
  flattenProduct,
  injectSum,
  nestProduct,
  projectSum,
  type Generic,
} from "./generic.js";
import { Shape, UNIT, isLeft, left, right, type Either, type Unit } from "./shape.js";

/** The value type of an enumerable. */
export type ValueOf<E> = E extends Countable<infer A> ? A : never;

// ============================================================================
// Unit / Never / Either / Option
// ============================================================================

/** The type with exactly one value, `[]`. */
export const unit: Enumerable<Unit> = deriveShape("()", Shape.unit);

/** The type with no values. */
export const never: Enumerable<never> = deriveShape("never", Shape.void);

/**
 * All `Left`s in the order of `L`, then all `Right`s in the order of `R`.
 */
export function either<L, R>(l: Enumerable<L>, r: Enumerable<R>): Enumerable<Either<L, R>> {
  return deriveShape(`Either<${l.typeName}, ${r.typeName}>`, Shape.sum(Shape.leaf(l), Shape.leaf(r)));
}

/**
 * `undefined` first, then every value of `A`. `A` must not itself contain
 * `undefined`, or that value would appear twice.
 */
export function option<A>(a: Enumerable<A>): Enumerable<A | undefined> {
  const iso: Generic<A | undefined, Either<Unit, A>> = {
    to: (value) => (value === undefined ? left(UNIT) : right(value)),
    from: (rep) => (isLeft(rep) ? undefined : rep.right),
  };
  return derive(`${a.typeName} | undefined`, Shape.sum(Shape.unit, Shape.leaf(a)), iso);
}

// ============================================================================
// Tuples and Records
// ============================================================================

/**
 * Every combination of one value from each component, the last component
 * varying fastest.
 *
 * ```typescript
 * enumerate(tuple(boolean, boolean));
 * // [[false, false], [false, true], [true, false], [true, true]]
 * ```
 */
export function tuple<Ts extends readonly unknown[]>(
  ...components: { readonly [K in keyof Ts]: Enumerable<Ts[K]> }
): Enumerable<Ts> {
  const leaves = components.map((c): Enumerable<unknown> => c);
  const arity = leaves.length;
  const typeName = `[${leaves.map((c) => c.typeName).join(", ")}]`;
  const iso: Generic<Ts, unknown> = {
    to: (value) => nestProduct(value),
    // Same cast as building a tuple from its elements: the length and order
    // come from `components`.
    from: (rep) => flattenProduct(rep, arity) as unknown as Ts,
  };
  return derive(typeName, Shape.products(leaves.map((c) => Shape.leaf(c))), iso);
}

/** Record fields, each enumerable. */
export type Fields<R> = { readonly [K in keyof R]: Enumerable<R[K]> };

function fieldEntries(fields: Record<string, Enumerable<unknown>>): [string, Enumerable<unknown>][] {
  return Object.keys(fields).map((name): [string, Enumerable<unknown>] => [name, fields[name]]);
}

function recordTypeName(entries: readonly (readonly [string, Enumerable<unknown>])[]): string {
  if (entries.length === 0) return "{}";
  return `{ ${entries.map(([name, e]) => `${name}: ${e.typeName}`).join("; ")} }`;
}

function productOfFields(entries: readonly (readonly [string, Enumerable<unknown>])[]): Shape<unknown> {
  return Shape.fields(entries.map(([name, e]) => [name, Shape.leaf(e)] as const));
}

function readField(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function assemble(
  names: readonly string[],
  rep: unknown,
  out: Record<string, unknown> = {},
): Record<string, unknown> {
  const values = flattenProduct(rep, names.length);
  names.forEach((name, i) => {
    out[name] = values[i];
  });
  return out;
}

/**
 * Every record with one value per field. Fields are taken in key order, the
 * last field varying fastest.
 *
 * Key order is JavaScript's own property order: integer-like keys (`"0"`,
 * `"1"`, ...) come first in ascending numeric order, then every other key in
 * the order it was written.
 *
 * ```typescript
 * const Cell = record({ open: boolean, order: ordering });
 * enumerate(Cell).slice(0, 2);
 * // [{ open: false, order: "LT" }, { open: false, order: "EQ" }]
 * ```
 */
export function record<R extends object>(fields: Fields<R>, typeName?: string): Enumerable<R> {
  const entries = fieldEntries(fields);
  const names = entries.map(([name]) => name);
  const iso: Generic<R, unknown> = {
    to: (value) => nestProduct(names.map((name) => readField(value, name))),
    // The keys and their value types come from `fields`.
    from: (rep) => assemble(names, rep) as R,
  };
  const shape = Shape.labeled(
    { kind: "type", name: typeName ?? recordTypeName(entries) },
    productOfFields(entries),
  );
  return derive(typeName ?? recordTypeName(entries), shape, iso);
}

// ============================================================================
// Variants
// ============================================================================

/** One tagged constructor: the discriminant plus the payload fields. */
export type Variant<D extends string, Tag, F> = { readonly [P in D]: Tag } & {
  readonly [P in keyof F]: ValueOf<F[P]>;
};

/** The union of every constructor of a `variants` declaration. */
export type VariantsOf<D extends string, C> = {
  [Tag in keyof C & string]: Variant<D, Tag, C[Tag]>;
}[keyof C & string];

/**
 * A discriminated union. Constructors are taken in key order, integer-like
 * tags first as in {@link record}; each one's fields vary as in {@link record}.
 *
 * ```typescript
 * const Light = variants("kind", {
 *   off: {},
 *   on: { bright: boolean },
 * });
 * enumerate(Light);
 * // [{ kind: "off" }, { kind: "on", bright: false }, { kind: "on", bright: true }]
 * ```
 */
export function variants<
  D extends string,
  C extends Record<string, Record<string, Enumerable<unknown>>>,
>(discriminant: D, constructors: C, typeName?: string): Enumerable<VariantsOf<D, C>> {
  const tags = Object.keys(constructors);
  const payloads = tags.map((tag) => {
    const entries = fieldEntries(constructors[tag]);
    return { tag, names: entries.map(([name]) => name), entries };
  });
  const arity = tags.length;
  const name =
    typeName ??
    (payloads
      .map(({ tag, entries }) =>
        entries.length === 0
          ? `{ ${discriminant}: "${tag}" }`
          : `{ ${discriminant}: "${tag}"; ${recordTypeName(entries).slice(2)}`,
      )
      .join(" | ") || "never");

  const iso: Generic<VariantsOf<D, C>, unknown> = {
    to: (value) => {
      const tag = readField(value, discriminant);
      const index = tags.findIndex((t) => t === tag);
      if (index < 0) {
        throw new TypeError(`${name}: unknown ${discriminant} ${String(tag)}`);
      }
      const payload = payloads[index].names.map((field) => readField(value, field));
      return injectSum(index, arity, nestProduct(payload));
    },
    from: (rep) => {
      const { index, value } = projectSum(rep, arity);
      const { tag, names } = payloads[index];
      const out = assemble(names, value, { [discriminant]: tag });
      // The discriminant and payload keys come from `constructors`.
      return out as unknown as VariantsOf<D, C>;
    },
  };

  const shape = Shape.labeled(
    { kind: "type", name },
    Shape.constructors(payloads.map(({ tag, entries }) => [tag, productOfFields(entries)] as const)),
  );
  return derive(name, shape, iso);
}

// ============================================================================
// Untagged Unions
// ============================================================================

/**
 * A union of types with no common discriminant, such as `boolean | "auto"`.
 * Every value of the first member, then every value of the second, and so on.
 *
 * The members must be disjoint. A value is matched back to its member by
 * `===` against that member's enumeration, so object-valued members should
 * be wrapped in {@link variants} instead.
 */
export function oneOf<Ts extends readonly unknown[]>(
  ...members: { readonly [K in keyof Ts]: Enumerable<Ts[K]> }
): Enumerable<Ts[number]> {
  const leaves = members.map((m): Enumerable<unknown> => m);
  const arity = leaves.length;
  const typeName = leaves.map((m) => m.typeName).join(" | ") || "never";
  const iso: Generic<Ts[number], unknown> = {
    to: (value) => {
      const index = leaves.findIndex((m) => m.enumerated().includes(value));
      if (index < 0) {
        throw new TypeError(`${typeName}: ${String(value)} is not a value of any member`);
      }
      return injectSum(index, arity, value);
    },
    // Each payload came out of the member at that position.
    from: (rep) => projectSum(rep, arity).value as Ts[number],
  };
  return derive(typeName, Shape.sums(leaves.map((m) => Shape.leaf(m))), iso);
}

// ============================================================================
// Isomorphic Wrappers
// ============================================================================

/**
 * Enumerate `B` through an isomorphism with `A`: same order, same cardinality.
 * For wrapper types such as `All`, `Any` or a branded id.
 *
 * ```typescript
 * const all = imap(boolean, "All", (b) => ({ all: b }), (a) => a.all);
 * ```
 */
export function imap<A, B>(
  source: Enumerable<A>,
  typeName: string,
  wrap: (a: A) => B,
  unwrap: (b: B) => A,
): Enumerable<B> {
  return derive(typeName, Shape.leaf(source), { to: unwrap, from: wrap });
}
