/**
 * Structural Derivation Engine
 *
 * Enumeration, cardinality and indexing over a `ShapeNode`, by structural
 * recursion:
 *
 * ```
 * enumerate(Unit)          = [UNIT]             cardinality = 1
 * enumerate(Void)          = []                 cardinality = 0
 * enumerate(Leaf T)        = T.values()         cardinality = |T|
 * enumerate(Product L R)   = [l, r] for l in L, for r in R
 *                                               cardinality = |L| * |R|
 * enumerate(Sum L R)       = Left(l)..., Right(r)...
 *                                               cardinality = |L| + |R|
 * enumerate(Labeled S)     = enumerate(S)
 * enumerate(Defer S)       = enumerate(force S)
 * ```
 *
 * Order is depth-first: constructors in declaration order, the last field
 * varies fastest. Cardinality never walks the values.
 */

import { ONE, ZERO, product, sum, type Cardinality } from "./cardinality.js";
import { StructuralError } from "./errors.js";
import { UNIT, left, right, type DeferNode, type ShapeNode } from "./shape.js";

// ============================================================================
// Cardinality
// ============================================================================

export function cardinalityOfShape(node: ShapeNode): Cardinality {
  switch (node._tag) {
    case "Unit":
      return ONE;
    case "Void":
      return ZERO;
    case "Leaf":
      return node.enumerable.cardinality();
    case "Product":
      return product(cardinalityOfShape(node.left), cardinalityOfShape(node.right));
    case "Sum":
      return sum(cardinalityOfShape(node.left), cardinalityOfShape(node.right));
    case "Labeled":
      return cardinalityOfShape(node.shape);
    case "Defer":
      return cardinalityOfShape(node.force());
  }
}

// ============================================================================
// Enumeration
// ============================================================================

/** Every representation value of `node`, lazily, in structural order. */
export function* iterateShape(node: ShapeNode): Generator<unknown, void, undefined> {
  switch (node._tag) {
    case "Unit":
      yield UNIT;
      return;
    case "Void":
      return;
    case "Leaf":
      yield* node.enumerable.values();
      return;
    case "Product": {
      // The inner loop is replayed once per left value.
      const rights = Array.from(iterateShape(node.right));
      if (rights.length === 0) return;
      for (const l of iterateShape(node.left)) {
        for (const r of rights) {
          yield [l, r] as const;
        }
      }
      return;
    }
    case "Sum":
      for (const l of iterateShape(node.left)) yield left(l);
      for (const r of iterateShape(node.right)) yield right(r);
      return;
    case "Labeled":
      yield* iterateShape(node.shape);
      return;
    case "Defer":
      yield* iterateShape(node.force());
      return;
  }
}

export function enumerateShape(node: ShapeNode): unknown[] {
  return Array.from(iterateShape(node));
}

// ============================================================================
// Indexing
// ============================================================================

/**
 * The representation value at `index`, computed from cardinalities alone.
 * The caller guarantees `0 <= index < cardinalityOfShape(node)`.
 */
export function indexShape(node: ShapeNode, index: bigint): unknown {
  switch (node._tag) {
    case "Unit":
      return UNIT;
    case "Void":
      throw new RangeError(`no value at index ${index} of an empty shape`);
    case "Leaf":
      return node.enumerable.at(index);
    case "Product": {
      const width = cardinalityOfShape(node.right);
      return [indexShape(node.left, index / width), indexShape(node.right, index % width)] as const;
    }
    case "Sum": {
      const split = cardinalityOfShape(node.left);
      return index < split
        ? left(indexShape(node.left, index))
        : right(indexShape(node.right, index - split));
    }
    case "Labeled":
      return indexShape(node.shape, index);
    case "Defer":
      return indexShape(node.force(), index);
  }
}

// ============================================================================
// Finiteness
// ============================================================================

/**
 * Reject shapes that refer back to themselves through a `Defer`.
 *
 * Every other node is finite by construction, so a walk that forces each
 * deferred shape once and watches for re-entry decides finiteness.
 *
 * @throws StructuralError with reason `"recursive"` and the label path to the cycle
 */
export function assertFinite(node: ShapeNode, typeName: string): void {
  const active = new Set<DeferNode>();
  // A thunk may build a fresh node on every force; the name still repeats.
  const activeNames = new Set<string>();
  const finished = new Set<DeferNode>();
  const path: string[] = [];

  const visit = (n: ShapeNode): void => {
    switch (n._tag) {
      case "Unit":
      case "Void":
      case "Leaf":
        return;
      case "Product":
      case "Sum":
        visit(n.left);
        visit(n.right);
        return;
      case "Labeled":
        path.push(`${n.label.kind} ${n.label.name}`);
        visit(n.shape);
        path.pop();
        return;
      case "Defer": {
        if (finished.has(n)) return;
        if (active.has(n) || activeNames.has(n.name)) {
          const trail = [...path, n.name];
          throw new StructuralError(
            typeName,
            "recursive",
            `${typeName} is self-referential through ${n.name} (${trail.join(" > ")}); ` +
              `recursive types have no finite enumeration`,
            trail,
          );
        }
        active.add(n);
        activeNames.add(n.name);
        path.push(n.name);
        visit(n.force());
        path.pop();
        activeNames.delete(n.name);
        active.delete(n);
        finished.add(n);
        return;
      }
    }
  };

  visit(node);
}
