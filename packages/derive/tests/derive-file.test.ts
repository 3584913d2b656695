/**
 * Tests for deriving a file on disk and for the CLI
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { deriveFile, parseArgs, relativeImport, runCli } from "../src/index.js";

const palette = fileURLToPath(new URL("./fixtures/palette.ts", import.meta.url));

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "finitary-derive-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function writeSource(name: string, lines: string[]): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, lines.join("\n"));
  return file;
}

describe("deriveFile", () => {
  it("derives the fixture without writing in check mode", () => {
    const result = deriveFile(palette, { check: true });
    expect(result.diagnostics).toEqual([]);
    expect(result.outPath).toBeUndefined();
    expect(result.code).toBe(
      [
        "// Generated by finitary-derive from palette.ts.",
        "",
        'import { literals, record, type Enumerable } from "@finitary/core";',
        'import { boolean } from "@finitary/std";',
        'import { Channel } from "./palette.js";',
        'import type { Depth, Swatch } from "./palette.js";',
        "",
        'export const channelEnumerable: Enumerable<Channel> = literals("Channel", [Channel.Red, Channel.Green, Channel.Blue]);',
        'export const depthEnumerable: Enumerable<Depth> = literals("Depth", [8, 16]);',
        'export const swatchEnumerable: Enumerable<Swatch> = record({ channel: channelEnumerable, depth: depthEnumerable, linear: boolean }, "Swatch");',
        "",
      ].join("\n"),
    );
    expect(fs.existsSync(palette.replace(/\.ts$/, ".enumerable.ts"))).toBe(false);
  });

  it("writes beside the source by default", () => {
    const file = writeSource("door.ts", ['export type Door = "open" | "shut";']);
    const result = deriveFile(file);
    expect(result.outPath).toBe(path.join(dir, "door.enumerable.ts"));
    expect(fs.readFileSync(path.join(dir, "door.enumerable.ts"), "utf8")).toBe(result.code);
    expect(result.code).toContain('import type { Door } from "./door.js";');
  });

  it("imports relative to a custom output path", () => {
    const file = writeSource("door.ts", ['export type Door = "open" | "shut";']);
    const out = path.join(dir, "generated", "door.ts");
    const result = deriveFile(file, { out });
    expect(result.outPath).toBe(out);
    expect(fs.existsSync(out)).toBe(true);
    expect(result.code).toContain('import type { Door } from "../door.js";');
  });

  it("writes nothing when the check fails", () => {
    const file = writeSource("name.ts", ["export type Name = string;"]);
    const result = deriveFile(file);
    expect(result.diagnostics.map((d) => d.code)).toEqual([7001]);
    expect(result.code).toBeUndefined();
    expect(fs.existsSync(path.join(dir, "name.enumerable.ts"))).toBe(false);
  });
});

describe("relativeImport", () => {
  it("uses ./ for siblings and ../ for parents", () => {
    expect(relativeImport("/src", "/src/cell.ts")).toBe("./cell.js");
    expect(relativeImport("/src/gen", "/src/cell.ts")).toBe("../cell.js");
    expect(relativeImport("/src", "/src/model/cell.ts")).toBe("./model/cell.js");
  });
});

describe("CLI", () => {
  it("parses options", () => {
    expect(parseArgs(["a.ts", "--out", "b.ts", "--check"])).toEqual({
      file: "a.ts",
      out: "b.ts",
      check: true,
      help: false,
    });
    expect(parseArgs(["a.ts", "--import", "@app/model"])).toEqual({
      file: "a.ts",
      importFrom: "@app/model",
      check: false,
      help: false,
    });
  });

  it("rejects unknown options and stray arguments", () => {
    expect(parseArgs(["--bogus"])).toBe("Unknown option: --bogus");
    expect(parseArgs(["a.ts", "b.ts"])).toBe("Unexpected argument: b.ts");
    expect(parseArgs(["a.ts", "--out"])).toBe("--out needs a path");
  });

  it("exits 2 on a usage error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(runCli(["--bogus"])).toBe(2);
    expect(error).toHaveBeenCalledWith("\x1b[31m✗\x1b[0m Unknown option: --bogus");
  });

  it("exits 1 and prints each error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const file = writeSource("name.ts", ["export type Name = string;"]);
    expect(runCli([file])).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "\x1b[31m✗\x1b[0m error[FIN7001]: `string` has infinitely many values\n  --> name.ts:1:20",
    );
    expect(error).toHaveBeenLastCalledWith(`\x1b[31m✗\x1b[0m ${file}: 1 error`);
  });

  it("exits 0 after a clean check", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const file = writeSource("door.ts", ['type Door = "open" | "shut";']);
    expect(runCli([file, "--check"])).toBe(0);
    expect(log).toHaveBeenCalledWith(
      "\x1b[33m⚠\x1b[0m warning[FIN7005]: `Door` is not exported; the generated module cannot import it\n  --> door.ts:1:6",
    );
    expect(log).toHaveBeenLastCalledWith(`\x1b[32m✓\x1b[0m ${file}: every type is finite`);
    expect(fs.existsSync(path.join(dir, "door.enumerable.ts"))).toBe(false);
  });
});
