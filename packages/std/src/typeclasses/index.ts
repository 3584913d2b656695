/**
 * Bounded and Ordinal instances for the primitive types the catalog enumerates.
 *
 * Each range is the full range of the fixed-width type it names. Ordinals are
 * the values themselves, widened to `bigint`.
 */

import type { Bounded, Enum, Ordinal } from "@finitary/core";

// ============================================================================
// Bounded
// ============================================================================

function boundedRange<A>(min: A, max: A): Bounded<A> {
  return { minBound: () => min, maxBound: () => max };
}

export const boundedBoolean: Bounded<boolean> = boundedRange(false, true);

export const boundedInt8: Bounded<number> = boundedRange(-0x80, 0x7f);
export const boundedUInt8: Bounded<number> = boundedRange(0, 0xff);
export const boundedInt16: Bounded<number> = boundedRange(-0x8000, 0x7fff);
export const boundedUInt16: Bounded<number> = boundedRange(0, 0xffff);
export const boundedInt32: Bounded<number> = boundedRange(-0x8000_0000, 0x7fff_ffff);
export const boundedUInt32: Bounded<number> = boundedRange(0, 0xffff_ffff);
export const boundedInt64: Bounded<bigint> = boundedRange(-(2n ** 63n), 2n ** 63n - 1n);
export const boundedUInt64: Bounded<bigint> = boundedRange(0n, 2n ** 64n - 1n);

/** Every Unicode code point, surrogates included, as a one-code-point string. */
export const boundedChar: Bounded<string> = boundedRange("\u{0}", "\u{10FFFF}");

// ============================================================================
// Enum
// ============================================================================

export const enumBoolean: Enum<boolean> = {
  succ: (a) => !a,
  pred: (a) => !a,
  toEnum: (n) => n !== 0,
  fromEnum: (a) => (a ? 1 : 0),
};

// ============================================================================
// Ordinal
// ============================================================================

export const ordinalNumber: Ordinal<number> = {
  toOrdinal: (n) => BigInt(n),
  fromOrdinal: (n) => Number(n),
};

export const ordinalBigInt: Ordinal<bigint> = {
  toOrdinal: (n) => n,
  fromOrdinal: (n) => n,
};

export const ordinalChar: Ordinal<string> = {
  toOrdinal: (c) => BigInt(c.codePointAt(0) ?? 0),
  fromOrdinal: (n) => String.fromCodePoint(Number(n)),
};
