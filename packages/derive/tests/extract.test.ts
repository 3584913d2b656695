/**
 * Tests for reading declarations out of source text
 */

import { describe, it, expect } from "vitest";
import { extractDeclarations } from "../src/index.js";

function only(source: string) {
  const [decl] = extractDeclarations(source, "input.ts");
  return decl;
}

describe("extractDeclarations", () => {
  it("reads literal unions and interfaces in source order", () => {
    const decls = extractDeclarations(
      [
        'export type Order = "LT" | "EQ" | "GT";',
        "export interface Cell {",
        "  open: boolean;",
        "  order?: Order;",
        "}",
      ].join("\n"),
      "cell.ts",
    );

    expect(decls.map((d) => [d.name, d.kind, d.exported])).toEqual([
      ["Order", "alias", true],
      ["Cell", "interface", true],
    ]);
    expect(decls[0]).toMatchObject({
      file: "cell.ts",
      position: { line: 1, column: 13 },
      type: { kind: "literals", values: ["LT", "EQ", "GT"] },
    });
    expect(decls[1]).toMatchObject({
      position: { line: 2, column: 18 },
      type: {
        kind: "object",
        fields: [
          { name: "open", optional: false, type: { kind: "reference", name: "boolean" } },
          { name: "order", optional: true, type: { kind: "reference", name: "Order" } },
        ],
      },
    });
  });

  it("finds the discriminant of a union of object literals", () => {
    const decl = only(['export type Light =', '  | { kind: "off" }', '  | { kind: "on"; bright: boolean };'].join("\n"));
    expect(decl.type).toMatchObject({
      kind: "variants",
      discriminant: "kind",
      variants: [
        { tag: "off", fields: [], position: { line: 2, column: 5 } },
        {
          tag: "on",
          fields: [{ name: "bright", type: { kind: "reference", name: "boolean" } }],
          position: { line: 3, column: 5 },
        },
      ],
    });
  });

  it("inlines interfaces named by a discriminated union", () => {
    const decls = extractDeclarations(
      [
        'interface Circle { type: "circle"; filled: boolean }',
        'interface Dot { type: "dot" }',
        "export type Mark = Circle | Dot;",
      ].join("\n"),
      "mark.ts",
    );
    const mark = decls[2];
    expect(mark.type.kind).toBe("variants");
    if (mark.type.kind !== "variants") return;
    expect(mark.type.discriminant).toBe("type");
    expect(mark.type.variants.map((v) => [v.tag, v.fields.map((f) => f.name)])).toEqual([
      ["circle", ["filled"]],
      ["dot", []],
    ]);
    expect(decls[0].exported).toBe(false);
  });

  it("treats `| undefined` as an option", () => {
    const decl = only("export type Maybe = Order | undefined;");
    expect(decl.type).toMatchObject({ kind: "option", inner: { kind: "reference", name: "Order" } });
  });

  it("keeps undefined inside a union of literals", () => {
    const decl = only('export type Tri = "yes" | "no" | undefined;');
    expect(decl.type).toMatchObject({ kind: "literals", values: ["yes", "no", undefined] });
  });

  it("groups the literals of an untagged union", () => {
    const decl = only('export type Mode = boolean | "auto";');
    expect(decl.type).toMatchObject({
      kind: "union",
      members: [
        { kind: "reference", name: "boolean" },
        { kind: "literals", values: ["auto"], text: '"auto"' },
      ],
    });
  });

  it("numbers enum members after the last initializer", () => {
    const decl = only("export enum Level { Low, Mid = 5, High }");
    expect(decl.kind).toBe("enum");
    expect(decl.type).toMatchObject({
      kind: "enum",
      members: [
        { name: "Low", value: 0 },
        { name: "Mid", value: 5 },
        { name: "High", value: 6 },
      ],
    });
  });

  it("reads string enums", () => {
    const decl = only('export enum Dir { Up = "up", Down = "down" }');
    expect(decl.type).toMatchObject({
      members: [
        { name: "Up", value: "up" },
        { name: "Down", value: "down" },
      ],
    });
  });

  it("unwraps readonly tuples", () => {
    const decl = only("export type Pair = readonly [boolean, -1 | 1];");
    expect(decl.type).toMatchObject({
      kind: "tuple",
      elements: [
        { kind: "reference", name: "boolean" },
        { kind: "literals", values: [-1, 1] },
      ],
    });
  });

  it("marks infinite field types", () => {
    const decl = only("export interface Row { id: string; tags: string[]; }");
    expect(decl.type).toMatchObject({
      kind: "object",
      fields: [
        { name: "id", type: { kind: "unsupported", reason: "infinite", detail: "string" } },
        { name: "tags", type: { kind: "unsupported", reason: "infinite", detail: "string[]" } },
      ],
    });
  });

  it("marks index signatures and methods as infinite", () => {
    const decl = only("export interface Bag { [key: string]: boolean; open(): void }");
    expect(decl.type).toMatchObject({
      fields: [
        { type: { kind: "unsupported", reason: "infinite", detail: "index signature" } },
        { type: { kind: "unsupported", reason: "infinite", detail: "method" } },
      ],
    });
  });

  it("does not handle generic declarations", () => {
    const decl = only("export type Box<T> = { value: T };");
    expect(decl.type).toMatchObject({
      kind: "unsupported",
      reason: "syntax",
      detail: "generic declaration `Box`",
    });
  });
});
