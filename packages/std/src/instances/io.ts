/**
 * I/O configuration enumerations.
 */

import {
  literals,
  record,
  successorFrom,
  type Enumerable,
} from "@finitary/core";

/**
 * Step through a fixed list of constructors, for types that know their
 * successor but carry no bounds.
 */
function stepping<const A>(typeName: string, constructors: readonly A[]): Enumerable<A> {
  return successorFrom(typeName, {
    zero: constructors[0],
    succ: (a) => constructors[constructors.indexOf(a) + 1],
  });
}

export type IOMode = "read" | "write" | "append" | "readWrite";

export const ioMode: Enumerable<IOMode> = stepping("IOMode", ["read", "write", "append", "readWrite"]);

export type SeekMode = "absolute" | "relative" | "fromEnd";

export const seekMode: Enumerable<SeekMode> = stepping("SeekMode", ["absolute", "relative", "fromEnd"]);

export type Newline = "lf" | "crlf";

export const newline: Enumerable<Newline> = literals("Newline", ["lf", "crlf"]);

/** How newlines are translated on input and on output. */
export interface NewlineMode {
  readonly inputNL: Newline;
  readonly outputNL: Newline;
}

export const newlineMode: Enumerable<NewlineMode> = record(
  { inputNL: newline, outputNL: newline },
  "NewlineMode",
);

/** Every encoding name `Buffer` accepts, aliases included. */
export const bufferEncoding: Enumerable<BufferEncoding> = literals("BufferEncoding", [
  "ascii",
  "utf8",
  "utf-8",
  "utf16le",
  "utf-16le",
  "ucs2",
  "ucs-2",
  "base64",
  "base64url",
  "latin1",
  "binary",
  "hex",
] satisfies readonly BufferEncoding[]);

export type BufferState = "read" | "write";

export const bufferState: Enumerable<BufferState> = literals("BufferState", ["read", "write"]);

export type IODeviceType = "directory" | "stream" | "regularFile" | "rawDevice";

export const ioDeviceType: Enumerable<IODeviceType> = literals("IODeviceType", [
  "directory",
  "stream",
  "regularFile",
  "rawDevice",
]);

export type CodingFailureMode = "error" | "ignore" | "transliterate" | "roundtrip";

export const codingFailureMode: Enumerable<CodingFailureMode> = literals("CodingFailureMode", [
  "error",
  "ignore",
  "transliterate",
  "roundtrip",
]);

export type CodingProgress = "inputUnderflow" | "outputUnderflow" | "invalidSequence";

export const codingProgress: Enumerable<CodingProgress> = literals("CodingProgress", [
  "inputUnderflow",
  "outputUnderflow",
  "invalidSequence",
]);
