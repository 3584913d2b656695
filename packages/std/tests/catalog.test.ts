/**
 * Tests for the primitive catalog
 */

import { describe, it, expect } from "vitest";
import { cardinality, either, enumerate, powerSet, tuple, valueAt } from "@finitary/core";
import {
  all,
  any,
  arithException,
  asyncException,
  boolean,
  bufferEncoding,
  char,
  codingFailureMode,
  codingProgress,
  formatAdjustment,
  formatSign,
  generalCategory,
  generalCategoryOf,
  int16,
  int8,
  ioDeviceType,
  ioMode,
  never,
  newline,
  newlineMode,
  ordering,
  seekMode,
  uint16,
  uint8,
  unit,
  bufferState,
} from "@finitary/std";

describe("primitives", () => {
  it("lists booleans and orderings in order", () => {
    expect(enumerate(boolean)).toEqual([false, true]);
    expect(enumerate(ordering)).toEqual(["LT", "EQ", "GT"]);
    expect(enumerate(unit)).toEqual([[]]);
    expect(enumerate(never)).toEqual([]);
  });

  it("counts fixed-width integers without listing them", () => {
    expect(cardinality(int8)).toBe(256n);
    expect(cardinality(uint8)).toBe(256n);
    expect(cardinality(int16)).toBe(65536n);
    expect(cardinality(uint16)).toBe(65536n);
  });

  it("runs each integer range from its minimum", () => {
    expect(valueAt(int8, 0)).toBe(-128);
    expect(valueAt(uint8, 255)).toBe(255);
    expect(valueAt(int16, 0)).toBe(-32768);
    expect(valueAt(uint16, 65535)).toBe(65535);
  });

  it("covers every code point", () => {
    expect(cardinality(char)).toBe(1_114_112n);
    expect(valueAt(char, 0x41)).toBe("A");
    expect(valueAt(char, 0x1f600)).toBe("\u{1F600}");
    expect(valueAt(char, 0x10ffff)).toBe("\u{10FFFF}");
  });
});

describe("composites over the catalog", () => {
  it("sums, multiplies and raises cardinalities", () => {
    expect(cardinality(either(boolean, ordering))).toBe(5n);
    expect(cardinality(tuple(boolean, ordering))).toBe(6n);
    expect(cardinality(powerSet(boolean))).toBe(4n);
    expect(enumerate(powerSet(boolean)).map((s) => [...s])).toEqual([
      [],
      [false],
      [false, true],
      [true],
    ]);
  });
});

describe("general categories", () => {
  it("lists all thirty", () => {
    expect(cardinality(generalCategory)).toBe(30n);
    expect(enumerate(generalCategory).slice(0, 3)).toEqual(["Lu", "Ll", "Lt"]);
  });

  it("classifies characters", () => {
    expect(generalCategoryOf("A")).toBe("Lu");
    expect(generalCategoryOf("a")).toBe("Ll");
    expect(generalCategoryOf("7")).toBe("Nd");
    expect(generalCategoryOf(" ")).toBe("Zs");
    expect(generalCategoryOf("\n")).toBe("Cc");
    expect(generalCategoryOf("$")).toBe("Sc");
    expect(generalCategoryOf("+")).toBe("Sm");
    expect(generalCategoryOf("\u{E000}")).toBe("Co");
  });
});

describe("I/O settings", () => {
  it("steps through modes without bounds", () => {
    expect(enumerate(ioMode)).toEqual(["read", "write", "append", "readWrite"]);
    expect(enumerate(seekMode)).toEqual(["absolute", "relative", "fromEnd"]);
    expect(cardinality(ioMode)).toBe(4n);
  });

  it("pairs newline conventions", () => {
    expect(enumerate(newline)).toEqual(["lf", "crlf"]);
    expect(enumerate(newlineMode)).toEqual([
      { inputNL: "lf", outputNL: "lf" },
      { inputNL: "lf", outputNL: "crlf" },
      { inputNL: "crlf", outputNL: "lf" },
      { inputNL: "crlf", outputNL: "crlf" },
    ]);
  });

  it("lists only encodings Buffer accepts", () => {
    for (const encoding of enumerate(bufferEncoding)) {
      expect(Buffer.isEncoding(encoding)).toBe(true);
    }
    expect(cardinality(bufferEncoding)).toBe(12n);
    expect(enumerate(bufferEncoding).slice(3, 5)).toEqual(["utf16le", "utf-16le"]);
  });

  it("lists device and coding states", () => {
    expect(enumerate(bufferState)).toEqual(["read", "write"]);
    expect(cardinality(ioDeviceType)).toBe(4n);
    expect(cardinality(codingFailureMode)).toBe(4n);
    expect(enumerate(codingProgress)).toEqual(["inputUnderflow", "outputUnderflow", "invalidSequence"]);
  });
});

describe("control", () => {
  it("lists exception kinds and format flags", () => {
    expect(cardinality(arithException)).toBe(6n);
    expect(enumerate(asyncException)[0]).toBe("stackOverflow");
    expect(enumerate(formatAdjustment)).toEqual(["leftAdjust", "zeroPad"]);
    expect(enumerate(formatSign)).toEqual(["signPlus", "signSpace"]);
  });

  it("wraps booleans as monoids", () => {
    expect(enumerate(all)).toEqual([{ all: false }, { all: true }]);
    expect(enumerate(any)).toEqual([{ any: false }, { any: true }]);
  });
});
