export * from "./primitives.js";
export * from "./unicode.js";
export * from "./io.js";
export * from "./control.js";
