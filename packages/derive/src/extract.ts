/**
 * Declaration extraction
 *
 * Reads type aliases, interfaces and enums from TypeScript source text with
 * the compiler API and turns each into a `Declaration`. Only syntax is used;
 * there is no type checker, so references are resolved by name later.
 *
 * Unsupported or infinite types are kept in the model as `unsupported`
 * nodes. `checkFiniteness` turns them into diagnostics.
 */

import ts from "typescript";
import type {
  Declaration,
  EnumMember,
  FieldInfo,
  LiteralValue,
  LiteralsExpr,
  ObjectExpr,
  SourcePosition,
  TypeExpr,
  VariantInfo,
} from "./model.js";

/** Discriminant names tried first, in order. */
const PREFERRED_DISCRIMINANTS = ["kind", "_tag", "type", "tag"];

type NamedDeclaration = ts.TypeAliasDeclaration | ts.InterfaceDeclaration | ts.EnumDeclaration;

function isNamedDeclaration(statement: ts.Statement): statement is NamedDeclaration {
  return (
    ts.isTypeAliasDeclaration(statement) ||
    ts.isInterfaceDeclaration(statement) ||
    ts.isEnumDeclaration(statement)
  );
}

function isExported(node: NamedDeclaration): boolean {
  return node.modifiers?.some((m) => m.kind === ts.SyntaxKind.ExportKeyword) ?? false;
}

function propertyName(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return undefined;
}

/**
 * Extract every type alias, interface and enum declared at the top level of
 * `source`, in source order.
 */
export function extractDeclarations(source: string, fileName: string): Declaration[] {
  const sourceFile = ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true);
  const named = new Map<string, NamedDeclaration>();
  for (const statement of sourceFile.statements) {
    if (isNamedDeclaration(statement)) named.set(statement.name.text, statement);
  }

  const positionOf = (node: ts.Node): SourcePosition => {
    const { line, character } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
    return { line: line + 1, column: character + 1 };
  };

  const base = (node: ts.Node): { text: string; position: SourcePosition } => ({
    text: node.getText(sourceFile),
    position: positionOf(node),
  });

  const infinite = (node: ts.Node, detail?: string): TypeExpr => ({
    kind: "unsupported",
    reason: "infinite",
    detail: detail ?? node.getText(sourceFile),
    ...base(node),
  });

  const syntax = (node: ts.Node, detail: string): TypeExpr => ({
    kind: "unsupported",
    reason: "syntax",
    detail,
    ...base(node),
  });

  // --------------------------------------------------------------------------
  // Literals
  // --------------------------------------------------------------------------

  const literalValue = (node: ts.TypeNode): LiteralValue | typeof NOT_LITERAL => {
    if (node.kind === ts.SyntaxKind.UndefinedKeyword || node.kind === ts.SyntaxKind.VoidKeyword) {
      return undefined;
    }
    if (!ts.isLiteralTypeNode(node)) return NOT_LITERAL;
    const literal = node.literal;
    if (ts.isStringLiteral(literal) || ts.isNoSubstitutionTemplateLiteral(literal)) return literal.text;
    if (ts.isNumericLiteral(literal)) return Number(literal.text);
    if (
      ts.isPrefixUnaryExpression(literal) &&
      literal.operator === ts.SyntaxKind.MinusToken &&
      ts.isNumericLiteral(literal.operand)
    ) {
      return -Number(literal.operand.text);
    }
    switch (literal.kind) {
      case ts.SyntaxKind.TrueKeyword:
        return true;
      case ts.SyntaxKind.FalseKeyword:
        return false;
      case ts.SyntaxKind.NullKeyword:
        return null;
      default:
        return NOT_LITERAL;
    }
  };

  // --------------------------------------------------------------------------
  // Objects
  // --------------------------------------------------------------------------

  const convertMembers = (node: ts.Node, members: ts.NodeArray<ts.TypeElement>): ObjectExpr => {
    const fields: FieldInfo[] = [];
    for (const member of members) {
      if (ts.isPropertySignature(member)) {
        const name = propertyName(member.name);
        if (name === undefined) {
          fields.push({
            name: member.name.getText(sourceFile),
            optional: false,
            type: syntax(member.name, `computed property name \`${member.name.getText(sourceFile)}\``),
          });
        } else if (member.type === undefined) {
          fields.push({ name, optional: false, type: syntax(member, `\`${name}\` has no type annotation`) });
        } else {
          fields.push({ name, optional: member.questionToken !== undefined, type: convert(member.type) });
        }
      } else if (ts.isIndexSignatureDeclaration(member)) {
        fields.push({ name: member.getText(sourceFile), optional: false, type: infinite(member, "index signature") });
      } else {
        fields.push({ name: member.getText(sourceFile), optional: false, type: infinite(member, "method") });
      }
    }
    return { kind: "object", fields, ...base(node) };
  };

  /** The fields of a union member that is, or names, an object type. */
  const objectOf = (node: ts.TypeNode): ObjectExpr | undefined => {
    if (ts.isTypeLiteralNode(node)) return convertMembers(node, node.members);
    if (ts.isParenthesizedTypeNode(node)) return objectOf(node.type);
    if (!ts.isTypeReferenceNode(node) || !ts.isIdentifier(node.typeName) || node.typeArguments) {
      return undefined;
    }
    const target = named.get(node.typeName.text);
    if (target === undefined || (!ts.isEnumDeclaration(target) && target.typeParameters?.length)) return undefined;
    if (ts.isInterfaceDeclaration(target) && !target.heritageClauses) {
      return convertMembers(target, target.members);
    }
    if (ts.isTypeAliasDeclaration(target) && ts.isTypeLiteralNode(target.type)) {
      return convertMembers(target.type, target.type.members);
    }
    return undefined;
  };

  // --------------------------------------------------------------------------
  // Unions
  // --------------------------------------------------------------------------

  const discriminantOf = (objects: readonly ObjectExpr[]): string | undefined => {
    const tagFields = objects.map(
      (o) =>
        new Set(
          o.fields
            .filter(
              (f) =>
                !f.optional &&
                f.type.kind === "literals" &&
                f.type.values.length === 1 &&
                typeof f.type.values[0] === "string",
            )
            .map((f) => f.name),
        ),
    );
    const common = [...tagFields[0]].filter((name) => tagFields.every((s) => s.has(name)));
    return PREFERRED_DISCRIMINANTS.find((name) => common.includes(name)) ?? common[0];
  };

  const variantsOf = (node: ts.UnionTypeNode, members: readonly ts.TypeNode[]): TypeExpr | undefined => {
    const objects: ObjectExpr[] = [];
    for (const member of members) {
      const object = objectOf(member);
      if (object === undefined) return undefined;
      objects.push(object);
    }
    const discriminant = discriminantOf(objects);
    if (discriminant === undefined) return undefined;

    const variants: VariantInfo[] = objects.map((object, i) => {
      const tagField = object.fields.find((f) => f.name === discriminant);
      const tag =
        tagField !== undefined && tagField.type.kind === "literals" ? String(tagField.type.values[0]) : "";
      return {
        tag,
        fields: object.fields.filter((f) => f.name !== discriminant),
        position: positionOf(members[i]),
      };
    });
    return { kind: "variants", discriminant, variants, ...base(node) };
  };

  const convertUnion = (node: ts.UnionTypeNode): TypeExpr => {
    const members = node.types;
    const values = members.map(literalValue);
    const isLiteral = (v: LiteralValue | typeof NOT_LITERAL): v is LiteralValue => v !== NOT_LITERAL;

    if (values.every(isLiteral)) {
      return { kind: "literals", values, ...base(node) };
    }

    const rest = members.filter((m) => literalValue(m) !== undefined);
    if (rest.length < members.length) {
      return { kind: "option", inner: convertAlternatives(node, rest), ...base(node) };
    }
    return convertAlternatives(node, members);
  };

  /** The members of a union other than `undefined`. */
  const convertAlternatives = (node: ts.UnionTypeNode, members: readonly ts.TypeNode[]): TypeExpr => {
    if (members.length === 1) return convert(members[0]);

    const variants = variantsOf(node, members);
    if (variants !== undefined) return variants;

    const literalMembers = members.filter((m) => literalValue(m) !== NOT_LITERAL);
    const converted: TypeExpr[] = [];
    let grouped = false;
    for (const member of members) {
      const value = literalValue(member);
      if (value === NOT_LITERAL) {
        converted.push(convert(member));
      } else if (!grouped) {
        grouped = true;
        const group: LiteralsExpr = {
          kind: "literals",
          values: literalMembers.map(literalValue).filter((v): v is LiteralValue => v !== NOT_LITERAL),
          text: literalMembers.map((m) => m.getText(sourceFile)).join(" | "),
          position: positionOf(member),
        };
        converted.push(group);
      }
    }
    return { kind: "union", members: converted, ...base(node) };
  };

  // --------------------------------------------------------------------------
  // Types
  // --------------------------------------------------------------------------

  function convert(node: ts.TypeNode): TypeExpr {
    const value = literalValue(node);
    if (value !== NOT_LITERAL) return { kind: "literals", values: [value], ...base(node) };

    switch (node.kind) {
      case ts.SyntaxKind.BooleanKeyword:
        return { kind: "reference", name: "boolean", ...base(node) };
      case ts.SyntaxKind.NeverKeyword:
        return { kind: "never", ...base(node) };
      case ts.SyntaxKind.StringKeyword:
      case ts.SyntaxKind.NumberKeyword:
      case ts.SyntaxKind.BigIntKeyword:
      case ts.SyntaxKind.SymbolKeyword:
      case ts.SyntaxKind.ObjectKeyword:
      case ts.SyntaxKind.AnyKeyword:
      case ts.SyntaxKind.UnknownKeyword:
        return infinite(node);
    }

    if (ts.isParenthesizedTypeNode(node)) return convert(node.type);
    if (ts.isTypeOperatorNode(node)) {
      return node.operator === ts.SyntaxKind.ReadonlyKeyword
        ? convert(node.type)
        : syntax(node, `\`${node.getText(sourceFile)}\``);
    }
    if (ts.isUnionTypeNode(node)) return convertUnion(node);
    if (ts.isTypeLiteralNode(node)) return convertMembers(node, node.members);
    if (ts.isTupleTypeNode(node)) {
      const elements = node.elements.map((element): TypeExpr => {
        if (ts.isRestTypeNode(element)) return infinite(element, "rest element");
        if (ts.isOptionalTypeNode(element)) return syntax(element, "optional tuple element");
        if (ts.isNamedTupleMember(element)) {
          if (element.dotDotDotToken) return infinite(element, "rest element");
          if (element.questionToken) return syntax(element, "optional tuple element");
          return convert(element.type);
        }
        return convert(element);
      });
      return { kind: "tuple", elements, ...base(node) };
    }
    if (ts.isTypeReferenceNode(node)) {
      if (!ts.isIdentifier(node.typeName)) {
        return syntax(node, `qualified name \`${node.typeName.getText(sourceFile)}\``);
      }
      if (node.typeArguments) {
        return syntax(node, `generic type \`${node.getText(sourceFile)}\``);
      }
      return { kind: "reference", name: node.typeName.text, ...base(node) };
    }
    if (ts.isArrayTypeNode(node)) return infinite(node);
    if (ts.isFunctionTypeNode(node) || ts.isConstructorTypeNode(node)) return infinite(node);
    if (ts.isTemplateLiteralTypeNode(node)) return infinite(node);
    return syntax(node, `\`${node.getText(sourceFile)}\``);
  }

  // --------------------------------------------------------------------------
  // Declarations
  // --------------------------------------------------------------------------

  const convertEnum = (node: ts.EnumDeclaration): TypeExpr => {
    const members: EnumMember[] = [];
    let next = 0;
    for (const member of node.members) {
      const name = propertyName(member.name);
      const init = member.initializer;
      if (name === undefined) return syntax(member, "computed enum member name");
      if (init === undefined) {
        members.push({ name, value: next });
        next += 1;
      } else if (ts.isStringLiteral(init)) {
        members.push({ name, value: init.text });
      } else if (ts.isNumericLiteral(init)) {
        members.push({ name, value: Number(init.text) });
        next = Number(init.text) + 1;
      } else {
        return syntax(member, `computed initializer for enum member \`${name}\``);
      }
    }
    return { kind: "enum", members, text: node.name.text, position: positionOf(node) };
  };

  const declarations: Declaration[] = [];
  for (const node of named.values()) {
    const common = {
      name: node.name.text,
      exported: isExported(node),
      file: fileName,
      position: positionOf(node.name),
    };

    if (ts.isEnumDeclaration(node)) {
      declarations.push({ ...common, kind: "enum", type: convertEnum(node) });
    } else if (node.typeParameters?.length) {
      declarations.push({
        ...common,
        kind: ts.isInterfaceDeclaration(node) ? "interface" : "alias",
        type: syntax(node.name, `generic declaration \`${node.name.text}\``),
      });
    } else if (ts.isInterfaceDeclaration(node)) {
      declarations.push({
        ...common,
        kind: "interface",
        type: node.heritageClauses
          ? syntax(node.heritageClauses[0], `\`${node.name.text}\` extends another type`)
          : convertMembers(node, node.members),
      });
    } else {
      declarations.push({ ...common, kind: "alias", type: convert(node.type) });
    }
  }
  return declarations;
}

const NOT_LITERAL: unique symbol = Symbol("not-literal");
