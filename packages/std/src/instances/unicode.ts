/**
 * Unicode general categories, by their two-letter property value aliases, in
 * the order the Unicode Character Database lists them.
 */

import { literals, type Enumerable } from "@finitary/core";

const GENERAL_CATEGORIES = [
  "Lu", "Ll", "Lt", "Lm", "Lo",
  "Mn", "Mc", "Me",
  "Nd", "Nl", "No",
  "Pc", "Pd", "Ps", "Pe", "Pi", "Pf", "Po",
  "Sm", "Sc", "Sk", "So",
  "Zs", "Zl", "Zp",
  "Cc", "Cf", "Cs", "Co", "Cn",
] as const;

export type GeneralCategory = (typeof GENERAL_CATEGORIES)[number];

export const generalCategory: Enumerable<GeneralCategory> = literals(
  "GeneralCategory",
  GENERAL_CATEGORIES,
);

const matchers = new Map(
  GENERAL_CATEGORIES.map((gc) => [gc, new RegExp(`^\\p{General_Category=${gc}}$`, "u")] as const),
);

/**
 * The general category of the first code point of `c`.
 *
 * ```typescript
 * generalCategoryOf("A"); // "Lu"
 * generalCategoryOf(" "); // "Zs"
 * ```
 */
export function generalCategoryOf(c: string): GeneralCategory {
  const point = String.fromCodePoint(c.codePointAt(0) ?? 0);
  for (const [gc, matcher] of matchers) {
    if (matcher.test(point)) return gc;
  }
  return "Cn";
}
