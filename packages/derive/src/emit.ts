/**
 * Code generation
 *
 * Writes one `Enumerable` constant per declaration, built from the
 * `@finitary/core` combinators:
 *
 * ```typescript
 * // cell.ts
 * export type Order = "LT" | "EQ" | "GT";
 * export interface Cell { open: boolean; order: Order }
 *
 * // cell.enumerable.ts
 * export const orderEnumerable: Enumerable<Order> = literals("Order", ["LT", "EQ", "GT"]);
 * export const cellEnumerable: Enumerable<Cell> = record({ open: boolean, order: orderEnumerable }, "Cell");
 * ```
 *
 * Run `checkFiniteness` first; emitting a declaration it rejects throws.
 */

import { CATALOG } from "./catalog.js";
import { displayLiteral } from "./finiteness.js";
import { referencesOf, type Declaration, type FieldInfo, type TypeExpr } from "./model.js";

export interface EmitOptions {
  /** Module specifier the generated file imports the declarations from. */
  readonly importFrom: string;
  /** Source file name for the header comment. */
  readonly sourceName?: string;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function uncapitalize(str: string): string {
  return str.charAt(0).toLowerCase() + str.slice(1);
}

/** Name of the generated constant for a declaration. */
export function enumerableName(declarationName: string): string {
  return `${uncapitalize(declarationName)}Enumerable`;
}

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

/** Local declarations before the declarations that refer to them. */
function dependencyOrder(declarations: readonly Declaration[]): Declaration[] {
  const local = new Map(declarations.map((d) => [d.name, d] as const));
  const ordered: Declaration[] = [];
  const visited = new Set<string>();
  const visit = (decl: Declaration): void => {
    if (visited.has(decl.name)) return;
    visited.add(decl.name);
    for (const name of referencesOf(decl.type)) {
      const dependency = local.get(name);
      if (dependency !== undefined) visit(dependency);
    }
    ordered.push(decl);
  };
  declarations.forEach(visit);
  return ordered;
}

/** Whether `undefined` is already one of the values of `type`. */
function admitsUndefined(
  type: TypeExpr,
  local: ReadonlyMap<string, Declaration>,
  seen: ReadonlySet<string> = new Set(),
): boolean {
  switch (type.kind) {
    case "option":
      return true;
    case "literals":
      return type.values.includes(undefined);
    case "union":
      return type.members.some((m) => admitsUndefined(m, local, seen));
    case "reference": {
      const target = local.get(type.name);
      if (target === undefined || seen.has(type.name)) return false;
      return admitsUndefined(target.type, local, new Set([...seen, type.name]));
    }
    default:
      return false;
  }
}

export function emitModule(declarations: readonly Declaration[], options: EmitOptions): string {
  const local = new Map(declarations.map((d) => [d.name, d] as const));
  const helpers = new Set<string>();
  const std = new Set<string>();

  const fields = (decl: Declaration, list: readonly FieldInfo[]): string => {
    if (list.length === 0) return "{}";
    const entries = list.map((field) => {
      const value = expression(decl, field.type);
      // `x?: T | undefined` has the same values as `x?: T`.
      if (!field.optional || admitsUndefined(field.type, local)) return `${propertyKey(field.name)}: ${value}`;
      helpers.add("option");
      return `${propertyKey(field.name)}: option(${value})`;
    });
    return `{ ${entries.join(", ")} }`;
  };

  const expression = (decl: Declaration, type: TypeExpr, typeName?: string): string => {
    switch (type.kind) {
      case "literals":
        helpers.add("literals");
        return `literals(${JSON.stringify(typeName ?? type.text)}, [${type.values.map(displayLiteral).join(", ")}])`;
      case "reference": {
        if (local.has(type.name)) return enumerableName(type.name);
        const instance = CATALOG.get(type.name);
        if (instance === undefined) {
          throw new Error(`${decl.name}: \`${type.name}\` does not resolve`);
        }
        std.add(instance);
        return instance;
      }
      case "object":
        helpers.add("record");
        return typeName === undefined
          ? `record(${fields(decl, type.fields)})`
          : `record(${fields(decl, type.fields)}, ${JSON.stringify(typeName)})`;
      case "tuple":
        helpers.add("tuple");
        return `tuple(${type.elements.map((e) => expression(decl, e)).join(", ")})`;
      case "option":
        helpers.add("option");
        return `option(${expression(decl, type.inner)})`;
      case "union":
        helpers.add("oneOf");
        return `oneOf(${type.members.map((m) => expression(decl, m)).join(", ")})`;
      case "variants": {
        helpers.add("variants");
        const constructors = type.variants
          .map((v) => `${propertyKey(v.tag)}: ${fields(decl, v.fields)}`)
          .join(", ");
        const name = typeName === undefined ? "" : `, ${JSON.stringify(typeName)}`;
        return `variants(${JSON.stringify(type.discriminant)}, { ${constructors} }${name})`;
      }
      case "enum": {
        helpers.add("literals");
        const members = type.members.map((m) =>
          IDENTIFIER.test(m.name) ? `${decl.name}.${m.name}` : `${decl.name}[${JSON.stringify(m.name)}]`,
        );
        return `literals(${JSON.stringify(decl.name)}, [${members.join(", ")}])`;
      }
      case "never":
        helpers.add("never");
        return "never";
      case "unsupported":
        throw new Error(`${decl.name}: cannot emit ${type.detail}`);
    }
  };

  const body = dependencyOrder(declarations).map(
    (decl) =>
      `export const ${enumerableName(decl.name)}: Enumerable<${decl.name}> = ${expression(decl, decl.type, decl.name)};`,
  );

  const enums = declarations.filter((d) => d.kind === "enum").map((d) => d.name);
  const types = declarations.filter((d) => d.kind !== "enum").map((d) => d.name);

  const imports = [`import { ${[...[...helpers].sort(), "type Enumerable"].join(", ")} } from "@finitary/core";`];
  if (std.size > 0) imports.push(`import { ${[...std].sort().join(", ")} } from "@finitary/std";`);
  if (enums.length > 0) imports.push(`import { ${enums.join(", ")} } from ${JSON.stringify(options.importFrom)};`);
  if (types.length > 0) {
    imports.push(`import type { ${types.join(", ")} } from ${JSON.stringify(options.importFrom)};`);
  }

  const header =
    options.sourceName === undefined
      ? "// Generated by finitary-derive."
      : `// Generated by finitary-derive from ${options.sourceName}.`;

  return [header, "", ...imports, "", ...body, ""].join("\n");
}
