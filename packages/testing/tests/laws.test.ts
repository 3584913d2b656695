/**
 * Tests for the Enumerable laws
 */

import { describe, it, expect, afterEach } from "vitest";
import { config, either, powerSet, record, type Enumerable } from "@finitary/core";
import { boolean, int8, ordering, uint8 } from "@finitary/std";
import { enumerableLaws, verifyEnumerableLaws } from "../src/index.js";

const liar: Enumerable<number> = {
  typeName: "Liar",
  values: () => [1, 2, 2],
  enumerated: () => [1, 2, 2],
  cardinality: () => 3n,
  at: (index) => [1, 2, 2][Number(index)],
};

afterEach(() => {
  config.reset();
});

describe("enumerableLaws", () => {
  it("has five laws, six with an ordinal", () => {
    expect(enumerableLaws(boolean).map((law) => law.name)).toEqual([
      "finite",
      "consistent",
      "distinct",
      "complete by index",
      "deterministic",
    ]);
    expect(enumerableLaws(uint8, { ordinal: (n) => n })).toHaveLength(6);
  });
});

describe("verifyEnumerableLaws", () => {
  it("holds for derived instances", () => {
    for (const E of [either(boolean, ordering), record({ open: boolean, order: ordering })]) {
      expect(verifyEnumerableLaws<unknown>(E)).toMatchObject({ total: 5, held: 5, failed: 0 });
    }
  });

  it("holds for power sets", () => {
    expect(verifyEnumerableLaws(powerSet(ordering)).failed).toBe(0);
  });

  it("checks ordinals against positions", () => {
    expect(verifyEnumerableLaws(uint8, { ordinal: (n) => n }).failed).toBe(0);

    const summary = verifyEnumerableLaws(int8, { ordinal: (n) => n });
    expect(summary.failed).toBe(1);
    expect(summary.results[5]).toEqual({
      law: "ordinal coincidence",
      status: "failed",
      counterexample: "Int8: value -128 at 0 has ordinal -128",
    });
  });

  it("reports each broken law of a faulty instance", () => {
    const summary = verifyEnumerableLaws(liar);
    expect(summary.results).toEqual([
      { law: "finite", status: "held" },
      { law: "consistent", status: "held" },
      { law: "distinct", status: "failed", counterexample: "Liar: 2 is listed at 1 and 2" },
      { law: "complete by index", status: "failed", counterexample: "Liar: at(3) returned a value past the end" },
      { law: "deterministic", status: "held" },
    ]);
  });

  it("catches a cardinality that undercounts", () => {
    const short: Enumerable<number> = { ...liar, typeName: "Short", cardinality: () => 2n };
    expect(verifyEnumerableLaws(short).results[0]).toEqual({
      law: "finite",
      status: "failed",
      counterexample: "Short: values() yields more than cardinality() = 2",
    });
  });

  it("refuses to list past the ceiling", () => {
    config.set({ limits: { ceiling: 100 } });
    const summary = verifyEnumerableLaws(uint8);
    expect(summary.failed).toBe(5);
    expect(new Set(summary.results.map((r) => r.counterexample))).toEqual(
      new Set(["UInt8 has 256 values, too many to check"]),
    );
  });
});
