/**
 * Backend AST Printer
 *
 * Converts typed TypeScript AST nodes into deterministic source text.
 * Pure and stateless - no parsing, no string heuristics.
 *
 * Layout: two-space indentation, object and array literals with members
 * one per line with trailing commas, empty bodies as `{}`.
 */

import type {
  TsBinaryOperator,
  TsBlockStatementAst,
  TsDeclarationAst,
  TsExpressionAst,
  TsImportDeclarationAst,
  TsImportSpecifierAst,
  TsModuleAst,
  TsObjectMemberAst,
  TsParameterAst,
  TsStatementAst,
  TsTypeAst,
  TsTypeParameterAst,
} from "./types.js";

const INDENT = "  ";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

export const isIdentifierName = (name: string): boolean => IDENTIFIER.test(name);

/**
 * Property names print bare when they are identifiers or array indices.
 */
export const printPropertyName = (name: string): string =>
  IDENTIFIER.test(name) || ARRAY_INDEX.test(name) ? name : JSON.stringify(name);

// ============================================================
// Type Printer
// ============================================================

export const printType = (type: TsTypeAst): string => {
  switch (type.kind) {
    case "typeReference": {
      const args =
        type.typeArguments && type.typeArguments.length > 0
          ? `<${type.typeArguments.map(printType).join(", ")}>`
          : "";
      return `${type.name}${args}`;
    }

    case "arrayType": {
      const element = printType(type.elementType);
      return type.elementType.kind === "intersectionType" ||
        type.elementType.kind === "unionType"
        ? `(${element})[]`
        : `${element}[]`;
    }

    case "intersectionType":
      return type.types
        .map((member) =>
          member.kind === "unionType" ? `(${printType(member)})` : printType(member)
        )
        .join(" & ");

    case "unionType":
      return type.types.map(printType).join(" | ");

    case "literalType":
      return type.text;

    default: {
      const exhaustiveCheck: never = type;
      throw new Error(
        `ICE: Unhandled type AST kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

export const printTypeParameters = (
  parameters: readonly TsTypeParameterAst[] | undefined
): string => {
  if (!parameters || parameters.length === 0) return "";
  const printed = parameters.map((p) => {
    const constraint = p.constraint ? ` extends ${printType(p.constraint)}` : "";
    const fallback = p.default ? ` = ${printType(p.default)}` : "";
    return `${p.name}${constraint}${fallback}`;
  });
  return `<${printed.join(", ")}>`;
};

// ============================================================
// Expression Printer
// ============================================================

const PRECEDENCE: Readonly<Record<TsBinaryOperator, number>> = {
  "&&": 1,
  "===": 2,
  "+": 3,
};

/**
 * Operands of member access, element access, calls and `new`.
 */
const printOperand = (expr: TsExpressionAst, indent: string): string => {
  const text = printExpression(expr, indent);
  return expr.kind === "binaryExpression" ||
    expr.kind === "arrowFunctionExpression" ||
    expr.kind === "newExpression"
    ? `(${text})`
    : text;
};

/**
 * Binary operands are parenthesised when they bind looser than the
 * operator, or as loose on the right.
 */
const printBinaryOperand = (
  operand: TsExpressionAst,
  operator: TsBinaryOperator,
  side: "left" | "right",
  indent: string
): string => {
  const text = printExpression(operand, indent);
  if (operand.kind !== "binaryExpression") return text;
  const inner = PRECEDENCE[operand.operatorToken];
  const outer = PRECEDENCE[operator];
  return inner < outer || (side === "right" && inner === outer) ? `(${text})` : text;
};

const printParameters = (parameters: readonly TsParameterAst[]): string =>
  parameters.map((p) => `${p.name}: ${printType(p.type)}`).join(", ");

const printList = (
  items: readonly string[],
  open: string,
  close: string,
  indent: string
): string => {
  if (items.length === 0) return `${open}${close}`;
  const inner = indent + INDENT;
  const lines = items.map((item) => `${inner}${item},`).join("\n");
  return `${open}\n${lines}\n${indent}${close}`;
};

const printObjectMember = (member: TsObjectMemberAst, indent: string): string => {
  switch (member.kind) {
    case "propertyAssignment":
      return `${printPropertyName(member.name)}: ${printExpression(member.value, indent)}`;
    case "method": {
      const returnType =
        member.returnType === "void" ? "void" : printType(member.returnType);
      return `${member.name}(${printParameters(member.parameters)}): ${returnType} ${printBlock(member.body, indent)}`;
    }
  }
};

export const printExpression = (expr: TsExpressionAst, indent = ""): string => {
  switch (expr.kind) {
    case "literalExpression":
      return expr.text;

    case "identifierExpression":
      return expr.identifier;

    case "referenceExpression":
      return expr.name;

    case "memberAccessExpression": {
      const target = printOperand(expr.expression, indent);
      return IDENTIFIER.test(expr.memberName)
        ? `${target}.${expr.memberName}`
        : `${target}[${JSON.stringify(expr.memberName)}]`;
    }

    case "elementAccessExpression":
      return `${printOperand(expr.expression, indent)}[${printExpression(expr.argument, indent)}]`;

    case "invocationExpression": {
      const typeArgs =
        expr.typeArguments && expr.typeArguments.length > 0
          ? `<${expr.typeArguments.map(printType).join(", ")}>`
          : "";
      const args = expr.arguments.map((a) => printExpression(a, indent)).join(", ");
      return `${printOperand(expr.expression, indent)}${typeArgs}(${args})`;
    }

    case "binaryExpression":
      return [
        printBinaryOperand(expr.left, expr.operatorToken, "left", indent),
        expr.operatorToken,
        printBinaryOperand(expr.right, expr.operatorToken, "right", indent),
      ].join(" ");

    case "newExpression": {
      const args = expr.arguments.map((a) => printExpression(a, indent)).join(", ");
      return `new ${printOperand(expr.expression, indent)}(${args})`;
    }

    case "objectLiteralExpression":
      return printList(
        expr.members.map((m) => printObjectMember(m, indent + INDENT)),
        "{",
        "}",
        indent
      );

    case "arrayLiteralExpression":
      return printList(
        expr.elements.map((e) => printExpression(e, indent + INDENT)),
        "[",
        "]",
        indent
      );

    case "arrowFunctionExpression":
      return `${printTypeParameters(expr.typeParameters)}(${printParameters(expr.parameters)}): ${printType(expr.returnType)} => ${printBlock(expr.body, indent)}`;

    default: {
      const exhaustiveCheck: never = expr;
      throw new Error(
        `ICE: Unhandled expression AST kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

// ============================================================
// Statement Printer
// ============================================================

/**
 * Print a block whose opening brace continues the current line.
 */
export const printBlock = (block: TsBlockStatementAst, indent: string): string => {
  if (block.statements.length === 0) return "{}";
  const inner = indent + INDENT;
  const statements = block.statements.map((s) => printStatement(s, inner)).join("\n");
  return `{\n${statements}\n${indent}}`;
};

export const printStatement = (stmt: TsStatementAst, indent: string): string => {
  switch (stmt.kind) {
    case "blockStatement":
      return `${indent}${printBlock(stmt, indent)}`;

    case "constStatement": {
      const binding =
        typeof stmt.binding === "string" ? stmt.binding : `[${stmt.binding.join(", ")}]`;
      const type = stmt.type ? `: ${printType(stmt.type)}` : "";
      return `${indent}const ${binding}${type} = ${printExpression(stmt.initializer, indent)};`;
    }

    case "expressionStatement":
      return `${indent}${printExpression(stmt.expression, indent)};`;

    case "returnStatement":
      return stmt.expression
        ? `${indent}return ${printExpression(stmt.expression, indent)};`
        : `${indent}return;`;

    case "ifStatement":
      return `${indent}if (${printExpression(stmt.condition, indent)}) ${printBlock(stmt.thenStatement, indent)}`;

    case "throwStatement":
      return `${indent}throw ${printExpression(stmt.expression, indent)};`;

    default: {
      const exhaustiveCheck: never = stmt;
      throw new Error(
        `ICE: Unhandled statement AST kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

// ============================================================
// Declaration Printer
// ============================================================

export const printDeclaration = (decl: TsDeclarationAst): string => {
  switch (decl.kind) {
    case "interfaceDeclaration": {
      const name = `${decl.name}${printTypeParameters(decl.typeParameters)}`;
      const members = decl.members.map(
        (m) => `${INDENT}readonly ${printPropertyName(m.name)}: ${printType(m.type)};`
      );
      return members.length === 0
        ? `export interface ${name} {}`
        : `export interface ${name} {\n${members.join("\n")}\n}`;
    }

    case "typeAliasDeclaration":
      return `export type ${decl.name}${printTypeParameters(decl.typeParameters)} = ${printType(decl.type)};`;

    case "constDeclaration": {
      const type = decl.type ? `: ${printType(decl.type)}` : "";
      return `export const ${decl.name}${type} = ${printExpression(decl.initializer, "")};`;
    }
  }
};

// ============================================================
// Import Printer
// ============================================================

const printSpecifier = (specifier: TsImportSpecifierAst, typePrefix: boolean): string => {
  const name = specifier.importedName
    ? `${specifier.importedName} as ${specifier.name}`
    : specifier.name;
  return typePrefix && specifier.typeOnly ? `type ${name}` : name;
};

export const printImport = (decl: TsImportDeclarationAst): string => {
  const from = ` from ${JSON.stringify(decl.module)};`;

  switch (decl.kind) {
    case "defaultImport":
      return `import ${decl.typeOnly ? "type " : ""}${decl.name}${from}`;

    case "namespaceImport":
      return `import ${decl.typeOnly ? "type " : ""}* as ${decl.name}${from}`;

    case "namedImport": {
      const allTypes = decl.specifiers.every((s) => s.typeOnly);
      const keyword = allTypes ? "import type" : "import";
      const specifiers = decl.specifiers.map((s) => printSpecifier(s, !allTypes));
      return specifiers.length === 1
        ? `${keyword} { ${specifiers.join("")} }${from}`
        : `${keyword} ${printList(specifiers, "{", "}", "")}${from}`;
    }
  }
};

// ============================================================
// Module Printer
// ============================================================

export const printModule = (module: TsModuleAst): string => {
  const parts = [
    module.headerText ?? "",
    module.imports.map(printImport).join("\n"),
    module.declarations.map(printDeclaration).join("\n\n"),
  ].filter((part) => part.length > 0);

  return parts.join("\n\n") + "\n";
};
