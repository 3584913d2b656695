import { describe, it, expect } from "vitest";
import {
  cardinality,
  either,
  enumerate,
  imap,
  left,
  literals,
  never,
  oneOf,
  option,
  powerSet,
  record,
  right,
  tuple,
  unit,
  valueAt,
  variants,
  type Enumerable,
} from "../src/index.js";

const bool = literals("boolean", [false, true]);
const ord = literals("Ordering", ["LT", "EQ", "GT"]);

function expectIndexable<A>(E: Enumerable<A>): void {
  const all = enumerate(E);
  expect(cardinality(E)).toBe(BigInt(all.length));
  all.forEach((value, i) => {
    expect(E.at(BigInt(i))).toEqual(value);
  });
}

describe("unit and never", () => {
  it("unit has exactly one value", () => {
    expect(enumerate(unit)).toEqual([[]]);
    expect(cardinality(unit)).toBe(1n);
  });

  it("never has no values", () => {
    expect(enumerate(never)).toEqual([]);
    expect(cardinality(never)).toBe(0n);
  });
});

describe("either", () => {
  const E = either(bool, ord);

  it("lists every left value, then every right value", () => {
    expect(enumerate(E)).toEqual([
      left(false),
      left(true),
      right("LT"),
      right("EQ"),
      right("GT"),
    ]);
    expect(cardinality(E)).toBe(5n);
    expect(E.typeName).toBe("Either<boolean, Ordering>");
  });

  it("rejects positions past the end", () => {
    expect(() => E.at(5n)).toThrow(new RangeError("Either<boolean, Ordering>: index 5 is outside 0..4"));
  });
});

describe("option", () => {
  it("puts undefined first", () => {
    const E = option(bool);
    expect(enumerate(E)).toEqual([undefined, false, true]);
    expect(E.typeName).toBe("boolean | undefined");
    expect(E.at(0n)).toBeUndefined();
  });

  it("has one value over an empty type", () => {
    expect(enumerate(option(never))).toEqual([undefined]);
  });
});

describe("tuple", () => {
  it("varies the last component fastest", () => {
    const E = tuple(bool, ord);
    expect(cardinality(E)).toBe(6n);
    expect(enumerate(E)[0]).toEqual([false, "LT"]);
    expect(enumerate(E)[5]).toEqual([true, "GT"]);
    expect(E.typeName).toBe("[boolean, Ordering]");
  });

  it("indexes three components without listing them", () => {
    const E = tuple(bool, bool, bool);
    expect(cardinality(E)).toBe(8n);
    expect(valueAt(E, 5)).toEqual([true, false, true]);
    expectIndexable(E);
  });
});

describe("record", () => {
  const Cell = record({ open: bool, order: ord });

  it("enumerates fields in key order", () => {
    expect(cardinality(Cell)).toBe(6n);
    expect(enumerate(Cell).slice(0, 2)).toEqual([
      { open: false, order: "LT" },
      { open: false, order: "EQ" },
    ]);
    expect(Cell.typeName).toBe("{ open: boolean; order: Ordering }");
    expectIndexable(Cell);
  });

  it("takes a display name", () => {
    expect(record({ open: bool }, "Door").typeName).toBe("Door");
  });

  it("has a single empty record when there are no fields", () => {
    const Empty = record({});
    expect(enumerate(Empty)).toEqual([{}]);
    expect(Empty.typeName).toBe("{}");
  });

  it("takes integer-like keys first, as JavaScript orders them", () => {
    const Keyed = record({ b: bool, 1: ord });
    expect(Keyed.typeName).toBe("{ 1: Ordering; b: boolean }");
    expect(enumerate(Keyed).slice(0, 2)).toEqual([
      { 1: "LT", b: false },
      { 1: "LT", b: true },
    ]);
    expect(Object.keys(Keyed.at(0n))).toEqual(["1", "b"]);
  });
});

describe("variants", () => {
  const Light = variants("kind", {
    off: {},
    on: { bright: bool },
  });

  it("lists constructors in key order", () => {
    expect(enumerate(Light)).toEqual([
      { kind: "off" },
      { kind: "on", bright: false },
      { kind: "on", bright: true },
    ]);
    expect(cardinality(Light)).toBe(3n);
    expect(Light.typeName).toBe('{ kind: "off" } | { kind: "on"; bright: boolean }');
  });

  it("indexes the middle constructor of three", () => {
    const Shape3 = variants("type", {
      dot: {},
      line: { dashed: bool },
      arc: { dashed: bool, turn: ord },
    });
    expect(cardinality(Shape3)).toBe(9n);
    expect(Shape3.at(2n)).toEqual({ type: "line", dashed: true });
    expect(Shape3.at(3n)).toEqual({ type: "arc", dashed: false, turn: "LT" });
    expectIndexable(Shape3);
  });

  it("is empty with no constructors", () => {
    const None = variants("kind", {});
    expect(enumerate(None)).toEqual([]);
    expect(None.typeName).toBe("never");
  });
});

describe("imap", () => {
  it("keeps the order and size of the source", () => {
    const All = imap(
      bool,
      "All",
      (all) => ({ all }),
      (wrapped) => wrapped.all,
    );
    expect(enumerate(All)).toEqual([{ all: false }, { all: true }]);
    expect(All.at(1n)).toEqual({ all: true });
  });
});

describe("powerSet", () => {
  it("orders subsets by their members' positions", () => {
    const E = powerSet(bool);
    expect(cardinality(E)).toBe(4n);
    expect(enumerate(E).map((s) => [...s])).toEqual([[], [false], [false, true], [true]]);
    expect(E.typeName).toBe("Set<boolean>");
  });

  it("unranks without listing", () => {
    const E = powerSet(ord);
    expect(cardinality(E)).toBe(8n);
    expect([...E.at(3n)]).toEqual(["LT", "EQ", "GT"]);
    expect([...E.at(7n)]).toEqual(["GT"]);
    expectIndexable(E);
  });

  it("has only the empty set over an empty type", () => {
    expect(enumerate(powerSet(never)).map((s) => s.size)).toEqual([0]);
  });
});

describe("valueAt", () => {
  it("rejects positions that are not integers", () => {
    expect(() => valueAt(bool, 1.5)).toThrow(new RangeError("boolean: index 1.5 is not an integer"));
  });

  it("rejects negative positions", () => {
    expect(() => valueAt(bool, -1)).toThrow(new RangeError("boolean: index -1 is outside 0..1"));
  });
});

describe("oneOf", () => {
  it("lists each member in turn", () => {
    const auto = literals('"auto"', ["auto"]);
    const E = oneOf(bool, auto);
    expect(enumerate(E)).toEqual([false, true, "auto"]);
    expect(E.typeName).toBe('boolean | "auto"');
    expect(E.at(2n)).toBe("auto");
  });

  it("is empty with no members", () => {
    expect(cardinality(oneOf())).toBe(0n);
  });
});
