/**
 * Core module exports for @finitary/core
 *
 * This package provides:
 * - Enumerable capabilities and cardinality arithmetic
 * - The shape algebra and the engine that walks it
 * - Adapters for primitive types and combinators for composite ones
 * - Guarded enumeration (size ceiling, deadline)
 */

export * from "./cardinality.js";
export * from "./errors.js";

// Capabilities
export {
  enumerableFrom,
  large,
  unsafeEnumerable,
  enumerate,
  cardinality,
  valueAt,
  checkIndex,
  type Countable,
  type Enumerable,
  type LargeEnumerable,
  type EnumerableParts,
} from "./enumerable.js";

// Shapes
export {
  Shape,
  UNIT,
  left,
  right,
  isLeft,
  type Unit,
  type Left,
  type Right,
  type Either,
  type Label,
  type ShapeNode,
  type UnitNode,
  type VoidNode,
  type LeafNode,
  type ProductNode,
  type SumNode,
  type LabeledNode,
  type DeferNode,
  type RepOf,
} from "./shape.js";

export {
  cardinalityOfShape,
  iterateShape,
  enumerateShape,
  indexShape,
  assertFinite,
} from "./engine.js";

// Derivation
export {
  derive,
  deriveShape,
  identity,
  nestProduct,
  flattenProduct,
  injectSum,
  projectSum,
  type Generic,
} from "./generic.js";

// Primitive Adapters
export {
  boundedOrdinal,
  fromBoundedEnum,
  successorFrom,
  literals,
  type Bounded,
  type Ordinal,
  type Enum,
  type Successor,
} from "./adapters.js";

// Combinators
export * from "./combinators.js";
export { powerSet } from "./power-set.js";

// Guarded Enumeration
export * from "./guards.js";

// Configuration System
export {
  config,
  defineConfig,
  configuredCeiling,
  configuredChunk,
  DEFAULT_CEILING,
  DEFAULT_CHUNK,
  type FinitaryConfig,
  type LimitsConfig,
  type DeadlineConfig,
} from "./config.js";

export { log } from "./log.js";
