import { enumerate, type Enumerable } from "@finitary/core";
import {
  all,
  any,
  arithException,
  asyncException,
  boolean,
  bufferEncoding,
  bufferState,
  codingFailureMode,
  codingProgress,
  formatAdjustment,
  formatSign,
  generalCategory,
  ioDeviceType,
  ioMode,
  newline,
  newlineMode,
  ordering,
  seekMode,
} from "@finitary/std";
import type { LiteralValue } from "./model.js";

type CatalogEntry = readonly [typeName: string, exportName: string, instance: Enumerable<unknown>];

const ENTRIES: readonly CatalogEntry[] = [
  ["boolean", "boolean", boolean],
  ["Ordering", "ordering", ordering],
  ["GeneralCategory", "generalCategory", generalCategory],
  ["IOMode", "ioMode", ioMode],
  ["SeekMode", "seekMode", seekMode],
  ["Newline", "newline", newline],
  ["NewlineMode", "newlineMode", newlineMode],
  ["BufferEncoding", "bufferEncoding", bufferEncoding],
  ["BufferState", "bufferState", bufferState],
  ["IODeviceType", "ioDeviceType", ioDeviceType],
  ["CodingFailureMode", "codingFailureMode", codingFailureMode],
  ["CodingProgress", "codingProgress", codingProgress],
  ["ArithException", "arithException", arithException],
  ["AsyncException", "asyncException", asyncException],
  ["FormatAdjustment", "formatAdjustment", formatAdjustment],
  ["FormatSign", "formatSign", formatSign],
  ["All", "all", all],
  ["Any", "any", any],
];

/**
 * Type names that resolve to an instance exported by `@finitary/std`.
 * A declaration of the same name in the source file takes precedence.
 */
export const CATALOG: ReadonlyMap<string, string> = new Map(
  ENTRIES.map(([typeName, exportName]) => [typeName, exportName] as const),
);

const INSTANCES: ReadonlyMap<string, Enumerable<unknown>> = new Map(
  ENTRIES.map(([typeName, , instance]) => [typeName, instance] as const),
);

function isLiteral(value: unknown): value is LiteralValue {
  return (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * The primitive values of a catalog type, or `undefined` for names outside
 * the catalog. Object values are left out; they never compare equal with `===`.
 */
export function catalogLiterals(typeName: string): readonly LiteralValue[] | undefined {
  const instance = INSTANCES.get(typeName);
  return instance === undefined ? undefined : enumerate(instance).filter(isLiteral);
}
