import * as fs from "fs";
import * as path from "path";
import { log } from "@finitary/core";
import { hasErrors, type Diagnostic } from "./diagnostics.js";
import { emitModule } from "./emit.js";
import { extractDeclarations } from "./extract.js";
import { checkFiniteness } from "./finiteness.js";

export interface DeriveFileOptions {
  /** Output path. Defaults to `<name>.enumerable.ts` beside the source. */
  readonly out?: string;
  /** Module the generated file imports the declarations from. */
  readonly importFrom?: string;
  /** Check only; write nothing. */
  readonly check?: boolean;
}

export interface DeriveFileResult {
  readonly diagnostics: readonly Diagnostic[];
  /** The generated module, unless an error was reported. */
  readonly code?: string;
  /** Where the module was written, unless checking or an error was reported. */
  readonly outPath?: string;
}

/** `./cell.js` for `src/cell.ts` seen from `src/`. */
export function relativeImport(fromDir: string, sourcePath: string): string {
  const parsed = path.parse(path.relative(fromDir, sourcePath));
  const specifier = path.posix.join(parsed.dir.split(path.sep).join("/"), `${parsed.name}.js`);
  return specifier.startsWith(".") ? specifier : `./${specifier}`;
}

/**
 * Read a TypeScript file, check its declarations and write the derivation
 * module. Nothing is written when the check reports an error.
 */
export function deriveFile(sourcePath: string, options: DeriveFileOptions = {}): DeriveFileResult {
  const source = fs.readFileSync(sourcePath, "utf8");
  const fileName = path.basename(sourcePath);
  const declarations = extractDeclarations(source, fileName);
  const diagnostics = checkFiniteness(declarations);

  if (hasErrors(diagnostics)) {
    log.debug(`${fileName}: ${diagnostics.length} diagnostic(s), nothing derived`);
    return { diagnostics };
  }

  const parsed = path.parse(sourcePath);
  const outPath = options.out ?? path.join(parsed.dir, `${parsed.name}.enumerable.ts`);
  const code = emitModule(declarations, {
    importFrom: options.importFrom ?? relativeImport(path.dirname(outPath), sourcePath),
    sourceName: fileName,
  });
  log.debug(`${fileName}: derived ${declarations.map((d) => d.name).join(", ")}`);

  if (options.check === true) return { diagnostics, code };

  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, code);
  return { diagnostics, code, outPath };
}
