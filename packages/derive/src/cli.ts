/**
 * finitary-derive CLI: derive `Enumerable` instances for the types in a file
 *
 * Usage:
 *   finitary-derive <file> [--out <path>] [--check] [--import <module>]
 */

import { formatDiagnostic, hasErrors } from "./diagnostics.js";
import { deriveFile } from "./derive-file.js";

interface CliOptions {
  file?: string;
  out?: string;
  importFrom?: string;
  check: boolean;
  help: boolean;
}

const COLORS = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
};

function success(message: string): void {
  console.log(`${COLORS.green}✓${COLORS.reset} ${message}`);
}

function warn(message: string): void {
  console.log(`${COLORS.yellow}⚠${COLORS.reset} ${message}`);
}

function error(message: string): void {
  console.error(`${COLORS.red}✗${COLORS.reset} ${message}`);
}

export function parseArgs(args: readonly string[]): CliOptions | string {
  const options: CliOptions = { check: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--out" || arg === "-o") {
      const value = args[++i];
      if (value === undefined) return `${arg} needs a path`;
      options.out = value;
    } else if (arg === "--import") {
      const value = args[++i];
      if (value === undefined) return `${arg} needs a module specifier`;
      options.importFrom = value;
    } else if (arg === "--check") {
      options.check = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg.startsWith("-")) {
      return `Unknown option: ${arg}`;
    } else if (options.file === undefined) {
      options.file = arg;
    } else {
      return `Unexpected argument: ${arg}`;
    }
  }
  return options;
}

function printHelp(): void {
  console.log(`
finitary-derive - Enumerable instances for finite TypeScript types

USAGE:
  finitary-derive <file> [options]

OPTIONS:
  -o, --out <path>      Output file (default: <file>.enumerable.ts beside the source)
  --import <module>     Module the output imports the types from
                        (default: the source file, relative to the output)
  --check               Report diagnostics only; write nothing
  -h, --help            Show this help message

EXAMPLES:
  finitary-derive src/cell.ts
  finitary-derive src/cell.ts --out src/generated/cell.ts
  finitary-derive src/cell.ts --check
`);
}

/** Run the CLI and return the process exit code. */
export function runCli(args: readonly string[]): number {
  const options = parseArgs(args);
  if (typeof options === "string") {
    error(options);
    return 2;
  }
  if (options.help) {
    printHelp();
    return 0;
  }
  if (options.file === undefined) {
    error("Missing input file");
    printHelp();
    return 2;
  }

  const result = deriveFile(options.file, {
    out: options.out,
    importFrom: options.importFrom,
    check: options.check,
  });

  for (const diagnostic of result.diagnostics) {
    const text = formatDiagnostic(diagnostic);
    if (diagnostic.severity === "error") error(text);
    else warn(text);
  }

  if (hasErrors(result.diagnostics)) {
    const count = result.diagnostics.filter((d) => d.severity === "error").length;
    error(`${options.file}: ${count} error${count === 1 ? "" : "s"}`);
    return 1;
  }

  if (result.outPath !== undefined) success(`Wrote ${result.outPath}`);
  else success(`${options.file}: every type is finite`);
  return 0;
}
