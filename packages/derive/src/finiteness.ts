/**
 * Static finiteness check
 *
 * Everything `emitModule` needs to be true before it writes code: every type
 * is finite, every reference resolves, no value or constructor is listed
 * twice and no declaration reaches itself through references.
 */

import { CATALOG, catalogLiterals } from "./catalog.js";
import {
  FIN7001,
  FIN7002,
  FIN7003,
  FIN7004,
  FIN7005,
  FIN7006,
  createDiagnostic,
  type Diagnostic,
} from "./diagnostics.js";
import { referencesOf, type Declaration, type LiteralValue, type TypeExpr } from "./model.js";

export function displayLiteral(value: LiteralValue): string {
  return value === undefined ? "undefined" : JSON.stringify(value);
}

/**
 * Diagnostics for a file's declarations: per-declaration problems in source
 * order, then one FIN7002 per reference cycle.
 */
export function checkFiniteness(declarations: readonly Declaration[]): Diagnostic[] {
  const local = new Map(declarations.map((d) => [d.name, d] as const));
  const diagnostics: Diagnostic[] = [];

  /** The primitive values a type contributes to a union around it. */
  const literalsOf = (type: TypeExpr, seen: ReadonlySet<string> = new Set()): LiteralValue[] => {
    switch (type.kind) {
      case "literals":
        return [...type.values];
      case "enum":
        return type.members.map((m) => m.value);
      case "option":
        return [undefined, ...literalsOf(type.inner, seen)];
      case "union":
        return type.members.flatMap((m) => literalsOf(m, seen));
      case "reference": {
        const target = local.get(type.name);
        if (target === undefined) return [...(catalogLiterals(type.name) ?? [])];
        return seen.has(type.name) ? [] : literalsOf(target.type, new Set([...seen, type.name]));
      }
      default:
        return [];
    }
  };

  for (const decl of declarations) {
    const report = (diagnostic: Diagnostic): void => {
      diagnostics.push(diagnostic);
    };

    const visit = (type: TypeExpr, owner: string): void => {
      switch (type.kind) {
        case "unsupported":
          report(
            type.reason === "infinite"
              ? createDiagnostic(FIN7001, { type: type.detail }, decl.file, type.position)
              : createDiagnostic(FIN7004, { detail: type.detail }, decl.file, type.position),
          );
          return;
        case "reference":
          if (!local.has(type.name) && !CATALOG.has(type.name)) {
            report(createDiagnostic(FIN7003, { name: type.name }, decl.file, type.position));
          }
          return;
        case "literals": {
          const seen = new Set<LiteralValue>();
          for (const value of type.values) {
            if (seen.has(value)) {
              report(
                createDiagnostic(
                  FIN7006,
                  { what: `literal ${displayLiteral(value)}`, type: owner },
                  decl.file,
                  type.position,
                ),
              );
            }
            seen.add(value);
          }
          return;
        }
        case "enum": {
          const seen = new Set<string | number>();
          for (const member of type.members) {
            if (seen.has(member.value)) {
              report(
                createDiagnostic(
                  FIN7006,
                  { what: `value ${JSON.stringify(member.value)}`, type: owner },
                  decl.file,
                  decl.position,
                ),
              );
            }
            seen.add(member.value);
          }
          return;
        }
        case "object":
          for (const field of type.fields) visit(field.type, type.text);
          return;
        case "tuple":
          for (const element of type.elements) visit(element, type.text);
          return;
        case "option":
          if (literalsOf(type.inner).includes(undefined)) {
            report(createDiagnostic(FIN7006, { what: "literal undefined", type: owner }, decl.file, type.position));
          }
          visit(type.inner, owner);
          return;
        case "union": {
          // Members are told apart by `===`, so no value may belong to two of them.
          const claimed = new Set<LiteralValue>();
          const reported = new Set<LiteralValue>();
          for (const member of type.members) {
            const values = new Set(literalsOf(member));
            for (const value of values) {
              if (claimed.has(value) && !reported.has(value)) {
                reported.add(value);
                report(
                  createDiagnostic(
                    FIN7006,
                    { what: `literal ${displayLiteral(value)}`, type: owner },
                    decl.file,
                    type.position,
                  ),
                );
              }
            }
            values.forEach((value) => claimed.add(value));
          }
          for (const member of type.members) visit(member, owner);
          return;
        }
        case "variants": {
          const seen = new Set<string>();
          for (const variant of type.variants) {
            if (seen.has(variant.tag)) {
              report(
                createDiagnostic(
                  FIN7006,
                  { what: `${type.discriminant} "${variant.tag}"`, type: owner },
                  decl.file,
                  variant.position,
                ),
              );
            }
            seen.add(variant.tag);
            for (const field of variant.fields) visit(field.type, owner);
          }
          return;
        }
        case "never":
          return;
      }
    };

    visit(decl.type, decl.name);
    if (!decl.exported) {
      report(createDiagnostic(FIN7005, { name: decl.name }, decl.file, decl.position));
    }
  }

  return [...diagnostics, ...findCycles(declarations, local)];
}

// ============================================================================
// Reference Cycles
// ============================================================================

function findCycles(
  declarations: readonly Declaration[],
  local: ReadonlyMap<string, Declaration>,
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const reported = new Set<string>();
  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (name: string): void => {
    const decl = local.get(name);
    if (decl === undefined || done.has(name)) return;

    const start = stack.indexOf(name);
    if (start >= 0) {
      const members = stack.slice(start);
      const key = [...members].sort().join(",");
      if (!reported.has(key)) {
        reported.add(key);
        const path = [...members, name].join(" > ");
        diagnostics.push(createDiagnostic(FIN7002, { name, path }, decl.file, decl.position));
      }
      return;
    }

    stack.push(name);
    for (const next of referencesOf(decl.type)) visit(next);
    stack.pop();
    done.add(name);
  };

  for (const decl of declarations) visit(decl.name);
  return diagnostics;
}
