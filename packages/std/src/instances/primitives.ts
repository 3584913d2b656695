/**
 * Primitive instances: booleans, comparison results, fixed-width integers
 * and characters.
 */

import {
  boundedOrdinal,
  fromBoundedEnum,
  literals,
  type Enumerable,
} from "@finitary/core";
import {
  boundedBoolean,
  boundedChar,
  boundedInt16,
  boundedInt8,
  boundedUInt16,
  boundedUInt8,
  enumBoolean,
  ordinalChar,
  ordinalNumber,
} from "../typeclasses/index.js";

export { unit, never } from "@finitary/core";

/** `false`, then `true`. */
export const boolean: Enumerable<boolean> = fromBoundedEnum("boolean", boundedBoolean, enumBoolean);

/** The result of a three-way comparison. */
export type Ordering = "LT" | "EQ" | "GT";

export const ordering: Enumerable<Ordering> = literals("Ordering", ["LT", "EQ", "GT"]);

export const int8: Enumerable<number> = boundedOrdinal("Int8", boundedInt8, ordinalNumber);
export const uint8: Enumerable<number> = boundedOrdinal("UInt8", boundedUInt8, ordinalNumber);
export const int16: Enumerable<number> = boundedOrdinal("Int16", boundedInt16, ordinalNumber);
export const uint16: Enumerable<number> = boundedOrdinal("UInt16", boundedUInt16, ordinalNumber);

/**
 * Every Unicode code point from U+0000 to U+10FFFF, 1,114,112 in all. Values
 * are strings holding one code point; the surrogate range is included as lone
 * surrogates.
 */
export const char: Enumerable<string> = boundedOrdinal("Char", boundedChar, ordinalChar);
