/**
 * @finitary/derive
 *
 * Reads TypeScript type declarations and writes the `Enumerable` instances
 * for them, after checking statically that every type is finite.
 *
 * ```typescript
 * import { deriveFile } from "@finitary/derive";
 *
 * const { diagnostics, outPath } = deriveFile("src/cell.ts");
 * ```
 */

export * from "./model.js";
export { CATALOG } from "./catalog.js";
export * from "./diagnostics.js";
export { extractDeclarations } from "./extract.js";
export { checkFiniteness, displayLiteral } from "./finiteness.js";
export { emitModule, enumerableName, uncapitalize, type EmitOptions } from "./emit.js";
export { deriveFile, relativeImport, type DeriveFileOptions, type DeriveFileResult } from "./derive-file.js";
export { parseArgs, runCli } from "./cli.js";
