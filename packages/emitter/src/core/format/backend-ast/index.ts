export type {
  TsBinding,
  TsTypeAst,
  TsTypeReferenceAst,
  TsTypeParameterAst,
  TsBinaryOperator,
  TsExpressionAst,
  TsStatementAst,
  TsBlockStatementAst,
  TsConstStatementAst,
  TsMethodAst,
  TsObjectMemberAst,
  TsParameterAst,
  TsInterfaceMemberAst,
  TsDeclarationAst,
  TsImportDeclarationAst,
  TsImportSpecifierAst,
  TsModuleAst,
} from "./types.js";
export * from "./builders.js";
export {
  isIdentifierName,
  printPropertyName,
  printType,
  printExpression,
  printBlock,
  printStatement,
  printDeclaration,
  printImport,
  printModule,
} from "./printer.js";
export { collectBoundNames, type BoundNameUse } from "./references.js";
