/**
 * Declaration model
 *
 * What the extractor reads out of a TypeScript source file: one
 * `Declaration` per type alias, interface or enum, each with a `TypeExpr`
 * describing the type structurally. References to other declarations stay
 * references; nothing is inlined except the constructors of a discriminated
 * union.
 */

export interface SourcePosition {
  readonly line: number;
  readonly column: number;
}

interface Node {
  /** Source text of the type, used as a display name for anonymous types. */
  readonly text: string;
  readonly position: SourcePosition;
}

/** A literal type value. `undefined` comes from `undefined` or `void`. */
export type LiteralValue = string | number | boolean | null | undefined;

/** A union of literal types, or a single one. */
export interface LiteralsExpr extends Node {
  readonly kind: "literals";
  readonly values: readonly LiteralValue[];
}

/** A named type: another declaration in the file, or a catalog type. */
export interface ReferenceExpr extends Node {
  readonly kind: "reference";
  readonly name: string;
}

export interface FieldInfo {
  readonly name: string;
  readonly optional: boolean;
  readonly type: TypeExpr;
}

export interface ObjectExpr extends Node {
  readonly kind: "object";
  readonly fields: readonly FieldInfo[];
}

export interface TupleExpr extends Node {
  readonly kind: "tuple";
  readonly elements: readonly TypeExpr[];
}

/** `T | undefined`, where `T` is not itself a literal union. */
export interface OptionExpr extends Node {
  readonly kind: "option";
  readonly inner: TypeExpr;
}

/** A union with no common discriminant. */
export interface UnionExpr extends Node {
  readonly kind: "union";
  readonly members: readonly TypeExpr[];
}

export interface VariantInfo {
  readonly tag: string;
  readonly fields: readonly FieldInfo[];
  readonly position: SourcePosition;
}

/** A union of object types sharing a string-literal discriminant field. */
export interface VariantsExpr extends Node {
  readonly kind: "variants";
  readonly discriminant: string;
  readonly variants: readonly VariantInfo[];
}

export interface EnumMember {
  readonly name: string;
  readonly value: string | number;
}

export interface EnumExpr extends Node {
  readonly kind: "enum";
  readonly members: readonly EnumMember[];
}

export interface NeverExpr extends Node {
  readonly kind: "never";
}

/**
 * A type with no finite enumeration (`string`, arrays, functions, ...) or
 * syntax the extractor does not handle.
 */
export interface UnsupportedExpr extends Node {
  readonly kind: "unsupported";
  readonly reason: "infinite" | "syntax";
  readonly detail: string;
}

export type TypeExpr =
  | LiteralsExpr
  | ReferenceExpr
  | ObjectExpr
  | TupleExpr
  | OptionExpr
  | UnionExpr
  | VariantsExpr
  | EnumExpr
  | NeverExpr
  | UnsupportedExpr;

export interface Declaration {
  readonly name: string;
  readonly kind: "alias" | "interface" | "enum";
  readonly exported: boolean;
  readonly type: TypeExpr;
  readonly file: string;
  readonly position: SourcePosition;
}

/**
 * Names of declarations a type refers to, in source order. Constructors
 * inlined into a discriminated union contribute their fields' references.
 */
export function referencesOf(type: TypeExpr): string[] {
  switch (type.kind) {
    case "reference":
      return [type.name];
    case "object":
      return type.fields.flatMap((f) => referencesOf(f.type));
    case "tuple":
      return type.elements.flatMap(referencesOf);
    case "option":
      return referencesOf(type.inner);
    case "union":
      return type.members.flatMap(referencesOf);
    case "variants":
      return type.variants.flatMap((v) => v.fields.flatMap((f) => referencesOf(f.type)));
    case "literals":
    case "enum":
    case "never":
    case "unsupported":
      return [];
  }
}
