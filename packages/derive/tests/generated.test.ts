/**
 * Tests that run the combinator expressions the generator writes
 */

import { describe, it, expect } from "vitest";
import * as fs from "fs";
import { fileURLToPath } from "url";
import { cardinality, enumerate, literals, oneOf, option, record, variants, type Enumerable } from "@finitary/core";
import { boolean } from "@finitary/std";
import { verifyEnumerableLaws } from "@finitary/testing";
import { checkFiniteness, emitModule, extractDeclarations } from "../src/index.js";
import { Level, type Light, type Mode, type Order, type Settings } from "./fixtures/settings.js";

const settingsFile = fileURLToPath(new URL("./fixtures/settings.ts", import.meta.url));

// The same expressions as the generated module's body, checked line for line below.
const levelEnumerable: Enumerable<Level> = literals("Level", [Level.Low, Level.High]);
const orderEnumerable: Enumerable<Order> = literals("Order", ["LT", "EQ", "GT"]);
const modeEnumerable: Enumerable<Mode> = oneOf(boolean, literals("\"auto\"", ["auto"]));
const settingsEnumerable: Enumerable<Settings> = record(
  { order: option(orderEnumerable), tone: literals("\"warm\" | undefined", ["warm", undefined]), mode: modeEnumerable },
  "Settings",
);
const lightEnumerable: Enumerable<Light> = variants(
  "kind",
  { off: {}, on: { level: levelEnumerable, dim: option(boolean) } },
  "Light",
);

describe("generated instances", () => {
  const declarations = extractDeclarations(fs.readFileSync(settingsFile, "utf8"), "settings.ts");

  it("are what the generator writes for the fixture", () => {
    expect(checkFiniteness(declarations)).toEqual([]);
    const body = emitModule(declarations, { importFrom: "./settings.js" })
      .split("\n")
      .filter((line) => line.startsWith("export const"));
    expect(body).toEqual([
      'export const levelEnumerable: Enumerable<Level> = literals("Level", [Level.Low, Level.High]);',
      'export const orderEnumerable: Enumerable<Order> = literals("Order", ["LT", "EQ", "GT"]);',
      'export const modeEnumerable: Enumerable<Mode> = oneOf(boolean, literals("\\"auto\\"", ["auto"]));',
      "export const settingsEnumerable: Enumerable<Settings> = record({ " +
        "order: option(orderEnumerable), " +
        'tone: literals("\\"warm\\" | undefined", ["warm", undefined]), ' +
        'mode: modeEnumerable }, "Settings");',
      "export const lightEnumerable: Enumerable<Light> = variants(" +
        '"kind", { off: {}, on: { level: levelEnumerable, dim: option(boolean) } }, "Light");',
    ]);
  });

  it("satisfy the Enumerable laws", () => {
    for (const E of [levelEnumerable, orderEnumerable, modeEnumerable, settingsEnumerable, lightEnumerable]) {
      expect(verifyEnumerableLaws<unknown>(E)).toMatchObject({ total: 5, held: 5, failed: 0 });
    }
  });

  it("list undefined once for an optional field typed `T | undefined`", () => {
    expect(cardinality(settingsEnumerable)).toBe(24n);
    expect(settingsEnumerable.at(0n)).toEqual({ order: undefined, tone: "warm", mode: false });
    const bare = enumerate(settingsEnumerable).filter(
      (s) => s.order === undefined && s.tone === undefined && s.mode === false,
    );
    expect(bare).toHaveLength(1);
  });

  it("enumerate each constructor of a discriminated union", () => {
    expect(cardinality(lightEnumerable)).toBe(7n);
    expect(enumerate(lightEnumerable).slice(0, 3)).toEqual([
      { kind: "off" },
      { kind: "on", level: Level.Low, dim: undefined },
      { kind: "on", level: Level.Low, dim: false },
    ]);
  });

  it("break distinctness when union members overlap, which the check rejects", () => {
    const overlapping = oneOf(boolean, literals("true", [true]));
    const summary = verifyEnumerableLaws(overlapping);
    expect(summary.results.find((r) => r.law === "distinct")).toEqual({
      law: "distinct",
      status: "failed",
      counterexample: "boolean | true: true is listed at 1 and 2",
    });
    expect(checkFiniteness(extractDeclarations("export type T = boolean | true;", "t.ts")).map((d) => d.code)).toEqual([
      7006,
    ]);
  });
});
