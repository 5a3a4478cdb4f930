/**
 * Bound-name collection
 *
 * Walks declarations and reports every name that carries a binding, with
 * the position it is used in. Import generation is driven by this walk
 * alone.
 */

import type {
  TsBinding,
  TsDeclarationAst,
  TsExpressionAst,
  TsObjectMemberAst,
  TsParameterAst,
  TsStatementAst,
  TsTypeAst,
  TsTypeParameterAst,
} from "./types.js";

export type BoundNameUse = {
  /** First segment of the referenced name */
  readonly name: string;
  readonly binding: TsBinding;
  readonly position: "type" | "value";
};

type Sink = (use: BoundNameUse) => void;

const headOf = (name: string): string => name.split(".")[0] ?? name;

const visitType = (type: TsTypeAst, sink: Sink): void => {
  switch (type.kind) {
    case "typeReference":
      sink({ name: headOf(type.name), binding: type.binding, position: "type" });
      type.typeArguments?.forEach((arg) => visitType(arg, sink));
      return;
    case "arrayType":
      visitType(type.elementType, sink);
      return;
    case "intersectionType":
    case "unionType":
      type.types.forEach((member) => visitType(member, sink));
      return;
    case "literalType":
      return;
  }
};

const visitTypeParameters = (
  parameters: readonly TsTypeParameterAst[] | undefined,
  sink: Sink
): void =>
  parameters?.forEach((p) => {
    if (p.constraint) visitType(p.constraint, sink);
    if (p.default) visitType(p.default, sink);
  });

const visitParameters = (parameters: readonly TsParameterAst[], sink: Sink): void =>
  parameters.forEach((p) => visitType(p.type, sink));

const visitObjectMember = (member: TsObjectMemberAst, sink: Sink): void => {
  switch (member.kind) {
    case "propertyAssignment":
      visitExpression(member.value, sink);
      return;
    case "method":
      visitParameters(member.parameters, sink);
      if (member.returnType !== "void") visitType(member.returnType, sink);
      member.body.statements.forEach((s) => visitStatement(s, sink));
      return;
  }
};

const visitExpression = (expr: TsExpressionAst, sink: Sink): void => {
  switch (expr.kind) {
    case "literalExpression":
    case "identifierExpression":
      return;
    case "referenceExpression":
      sink({ name: headOf(expr.name), binding: expr.binding, position: "value" });
      return;
    case "memberAccessExpression":
      visitExpression(expr.expression, sink);
      return;
    case "elementAccessExpression":
      visitExpression(expr.expression, sink);
      visitExpression(expr.argument, sink);
      return;
    case "invocationExpression":
      visitExpression(expr.expression, sink);
      expr.typeArguments?.forEach((t) => visitType(t, sink));
      expr.arguments.forEach((a) => visitExpression(a, sink));
      return;
    case "binaryExpression":
      visitExpression(expr.left, sink);
      visitExpression(expr.right, sink);
      return;
    case "newExpression":
      visitExpression(expr.expression, sink);
      expr.arguments.forEach((a) => visitExpression(a, sink));
      return;
    case "objectLiteralExpression":
      expr.members.forEach((m) => visitObjectMember(m, sink));
      return;
    case "arrayLiteralExpression":
      expr.elements.forEach((e) => visitExpression(e, sink));
      return;
    case "arrowFunctionExpression":
      visitTypeParameters(expr.typeParameters, sink);
      visitParameters(expr.parameters, sink);
      visitType(expr.returnType, sink);
      expr.body.statements.forEach((s) => visitStatement(s, sink));
      return;
  }
};

const visitStatement = (stmt: TsStatementAst, sink: Sink): void => {
  switch (stmt.kind) {
    case "blockStatement":
      stmt.statements.forEach((s) => visitStatement(s, sink));
      return;
    case "constStatement":
      if (stmt.type) visitType(stmt.type, sink);
      visitExpression(stmt.initializer, sink);
      return;
    case "expressionStatement":
    case "throwStatement":
      visitExpression(stmt.expression, sink);
      return;
    case "returnStatement":
      if (stmt.expression) visitExpression(stmt.expression, sink);
      return;
    case "ifStatement":
      visitExpression(stmt.condition, sink);
      visitStatement(stmt.thenStatement, sink);
      return;
  }
};

const visitDeclaration = (decl: TsDeclarationAst, sink: Sink): void => {
  switch (decl.kind) {
    case "interfaceDeclaration":
      visitTypeParameters(decl.typeParameters, sink);
      decl.members.forEach((m) => visitType(m.type, sink));
      return;
    case "typeAliasDeclaration":
      visitTypeParameters(decl.typeParameters, sink);
      visitType(decl.type, sink);
      return;
    case "constDeclaration":
      if (decl.type) visitType(decl.type, sink);
      visitExpression(decl.initializer, sink);
      return;
  }
};

/**
 * Every bound name used by the declarations, in first-use order.
 */
export const collectBoundNames = (
  declarations: readonly TsDeclarationAst[]
): readonly BoundNameUse[] => {
  const uses: BoundNameUse[] = [];
  declarations.forEach((decl) => visitDeclaration(decl, (use) => uses.push(use)));
  return uses;
};
