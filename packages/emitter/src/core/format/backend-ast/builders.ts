/**
 * Builders for backend TypeScript AST nodes.
 */

import type {
  TsArrayLiteralExpressionAst,
  TsArrowFunctionExpressionAst,
  TsBinaryOperator,
  TsBinding,
  TsBlockStatementAst,
  TsConstDeclarationAst,
  TsConstStatementAst,
  TsExpressionAst,
  TsInterfaceDeclarationAst,
  TsInterfaceMemberAst,
  TsInvocationExpressionAst,
  TsLiteralExpressionAst,
  TsMethodAst,
  TsObjectLiteralExpressionAst,
  TsObjectMemberAst,
  TsParameterAst,
  TsPropertyAssignmentAst,
  TsStatementAst,
  TsTypeAliasDeclarationAst,
  TsTypeAst,
  TsTypeParameterAst,
  TsTypeReferenceAst,
} from "./types.js";

export const globalBinding: TsBinding = { kind: "global" };
export const localBinding: TsBinding = { kind: "local" };
export const runtimeBinding = (importedName: string): TsBinding => ({
  kind: "runtime",
  importedName,
});

// Types

export const typeReference = (
  name: string,
  binding: TsBinding,
  typeArguments: readonly TsTypeAst[] = []
): TsTypeReferenceAst => ({
  kind: "typeReference",
  name,
  binding,
  ...(typeArguments.length > 0 ? { typeArguments } : {}),
});

export const arrayType = (elementType: TsTypeAst): TsTypeAst => ({
  kind: "arrayType",
  elementType,
});

export const intersectionType = (types: readonly TsTypeAst[]): TsTypeAst => ({
  kind: "intersectionType",
  types,
});

export const unionType = (types: readonly TsTypeAst[]): TsTypeAst => ({
  kind: "unionType",
  types,
});

export const literalType = (value: string): TsTypeAst => ({
  kind: "literalType",
  text: JSON.stringify(value),
});

export const typeParameter = (
  name: string,
  constraint?: TsTypeAst,
  fallback?: TsTypeAst
): TsTypeParameterAst => ({
  name,
  ...(constraint ? { constraint } : {}),
  ...(fallback ? { default: fallback } : {}),
});

// Expressions

export const identifier = (name: string): TsExpressionAst => ({
  kind: "identifierExpression",
  identifier: name,
});

export const reference = (name: string, binding: TsBinding): TsExpressionAst => ({
  kind: "referenceExpression",
  name,
  binding,
});

export const stringLiteral = (value: string): TsLiteralExpressionAst => ({
  kind: "literalExpression",
  text: JSON.stringify(value),
});

export const numericLiteral = (value: number): TsLiteralExpressionAst => ({
  kind: "literalExpression",
  text: String(value),
});

export const memberAccess = (
  expression: TsExpressionAst,
  memberName: string
): TsExpressionAst => ({
  kind: "memberAccessExpression",
  expression,
  memberName,
});

export const elementAccess = (
  expression: TsExpressionAst,
  argument: TsExpressionAst
): TsExpressionAst => ({
  kind: "elementAccessExpression",
  expression,
  argument,
});

export const invocation = (
  expression: TsExpressionAst,
  args: readonly TsExpressionAst[],
  typeArguments: readonly TsTypeAst[] = []
): TsInvocationExpressionAst => ({
  kind: "invocationExpression",
  expression,
  arguments: args,
  ...(typeArguments.length > 0 ? { typeArguments } : {}),
});

export const binary = (
  operatorToken: TsBinaryOperator,
  left: TsExpressionAst,
  right: TsExpressionAst
): TsExpressionAst => ({
  kind: "binaryExpression",
  operatorToken,
  left,
  right,
});

export const plus = (left: TsExpressionAst, right: TsExpressionAst): TsExpressionAst =>
  binary("+", left, right);

export const strictEquals = (left: TsExpressionAst, right: TsExpressionAst): TsExpressionAst =>
  binary("===", left, right);

export const and = (left: TsExpressionAst, right: TsExpressionAst): TsExpressionAst =>
  binary("&&", left, right);

export const newExpression = (
  expression: TsExpressionAst,
  args: readonly TsExpressionAst[]
): TsExpressionAst => ({
  kind: "newExpression",
  expression,
  arguments: args,
});

export const property = (name: string, value: TsExpressionAst): TsPropertyAssignmentAst => ({
  kind: "propertyAssignment",
  name,
  value,
});

export const method = (
  name: string,
  parameters: readonly TsParameterAst[],
  returnType: TsTypeAst | "void",
  statements: readonly TsStatementAst[]
): TsMethodAst => ({
  kind: "method",
  name,
  parameters,
  returnType,
  body: block(statements),
});

export const objectLiteral = (
  members: readonly TsObjectMemberAst[]
): TsObjectLiteralExpressionAst => ({
  kind: "objectLiteralExpression",
  members,
});

export const arrayLiteral = (
  elements: readonly TsExpressionAst[]
): TsArrayLiteralExpressionAst => ({
  kind: "arrayLiteralExpression",
  elements,
});

export const arrowFunction = (
  parameters: readonly TsParameterAst[],
  returnType: TsTypeAst,
  statements: readonly TsStatementAst[],
  typeParameters: readonly TsTypeParameterAst[] = []
): TsArrowFunctionExpressionAst => ({
  kind: "arrowFunctionExpression",
  ...(typeParameters.length > 0 ? { typeParameters } : {}),
  parameters,
  returnType,
  body: block(statements),
});

export const parameter = (name: string, type: TsTypeAst): TsParameterAst => ({
  name,
  type,
});

// Statements

export const block = (statements: readonly TsStatementAst[]): TsBlockStatementAst => ({
  kind: "blockStatement",
  statements,
});

export const constStatement = (
  binding: string | readonly string[],
  initializer: TsExpressionAst,
  type?: TsTypeAst
): TsConstStatementAst => ({
  kind: "constStatement",
  binding,
  initializer,
  ...(type ? { type } : {}),
});

export const expressionStatement = (expression: TsExpressionAst): TsStatementAst => ({
  kind: "expressionStatement",
  expression,
});

export const returnStatement = (expression?: TsExpressionAst): TsStatementAst => ({
  kind: "returnStatement",
  ...(expression ? { expression } : {}),
});

export const ifStatement = (
  condition: TsExpressionAst,
  statements: readonly TsStatementAst[]
): TsStatementAst => ({
  kind: "ifStatement",
  condition,
  thenStatement: block(statements),
});

export const throwStatement = (expression: TsExpressionAst): TsStatementAst => ({
  kind: "throwStatement",
  expression,
});

// Declarations

export const interfaceDeclaration = (
  name: string,
  members: readonly TsInterfaceMemberAst[],
  typeParameters: readonly TsTypeParameterAst[] = []
): TsInterfaceDeclarationAst => ({
  kind: "interfaceDeclaration",
  name,
  ...(typeParameters.length > 0 ? { typeParameters } : {}),
  members,
});

export const typeAliasDeclaration = (
  name: string,
  type: TsTypeAst,
  typeParameters: readonly TsTypeParameterAst[] = []
): TsTypeAliasDeclarationAst => ({
  kind: "typeAliasDeclaration",
  name,
  ...(typeParameters.length > 0 ? { typeParameters } : {}),
  type,
});

export const constDeclaration = (
  name: string,
  initializer: TsExpressionAst,
  type?: TsTypeAst
): TsConstDeclarationAst => ({
  kind: "constDeclaration",
  name,
  initializer,
  ...(type ? { type } : {}),
});
