/**
 * Backend TypeScript AST type definitions
 *
 * Structured AST nodes for deterministic TypeScript code generation.
 *
 * Pipeline: ValidatedTable -> typed TsAst -> deterministic printer -> text
 *
 * INVARIANT: No raw text nodes exist. Every construct is represented by an
 * explicit, strongly-typed AST node, so that every referenced name can be
 * found by walking the tree.
 */

// ============================================================
// Name bindings
// ============================================================

/**
 * Where a referenced name comes from, and so how it is imported.
 */
export type TsBinding =
  /** Ambient (`string`, `number`) or otherwise unbound; never imported */
  | { readonly kind: "global" }
  /** Declared in the module being generated */
  | { readonly kind: "local" }
  /**
   * Part of the archiving runtime contract. The printed name differs from
   * `importedName` when the source file already binds it.
   */
  | { readonly kind: "runtime"; readonly importedName: string }
  /** Bound in the source file; imported the way the source binds it */
  | {
      readonly kind: "source";
      readonly importKind: "named" | "default" | "namespace";
      readonly importedName: string;
      readonly module: string;
    }
  /** Generated beside another mirror's declaration */
  | { readonly kind: "companion"; readonly module: string };

// ============================================================
// Type AST
// ============================================================

export type TsTypeReferenceAst = {
  readonly kind: "typeReference";
  /** Possibly dotted; the first segment carries the binding */
  readonly name: string;
  readonly binding: TsBinding;
  readonly typeArguments?: readonly TsTypeAst[];
};

export type TsArrayTypeAst = {
  readonly kind: "arrayType";
  readonly elementType: TsTypeAst;
};

export type TsIntersectionTypeAst = {
  readonly kind: "intersectionType";
  readonly types: readonly TsTypeAst[];
};

export type TsUnionTypeAst = {
  readonly kind: "unionType";
  readonly types: readonly TsTypeAst[];
};

/** A string literal type: `"circle"` */
export type TsLiteralTypeAst = {
  readonly kind: "literalType";
  readonly text: string;
};

export type TsTypeAst =
  | TsTypeReferenceAst
  | TsArrayTypeAst
  | TsIntersectionTypeAst
  | TsUnionTypeAst
  | TsLiteralTypeAst;

export type TsTypeParameterAst = {
  readonly name: string;
  readonly constraint?: TsTypeAst;
  readonly default?: TsTypeAst;
};

// ============================================================
// Expression AST
// ============================================================

export type TsLiteralExpressionAst = {
  readonly kind: "literalExpression";
  /** The literal token text: `"a"`, `0` */
  readonly text: string;
};

/** A parameter or local of the generated code */
export type TsIdentifierExpressionAst = {
  readonly kind: "identifierExpression";
  readonly identifier: string;
};

/** A name bound outside the generated function */
export type TsReferenceExpressionAst = {
  readonly kind: "referenceExpression";
  readonly name: string;
  readonly binding: TsBinding;
};

export type TsMemberAccessExpressionAst = {
  readonly kind: "memberAccessExpression";
  readonly expression: TsExpressionAst;
  readonly memberName: string;
};

export type TsElementAccessExpressionAst = {
  readonly kind: "elementAccessExpression";
  readonly expression: TsExpressionAst;
  readonly argument: TsExpressionAst;
};

export type TsInvocationExpressionAst = {
  readonly kind: "invocationExpression";
  readonly expression: TsExpressionAst;
  readonly arguments: readonly TsExpressionAst[];
  readonly typeArguments?: readonly TsTypeAst[];
};

export type TsBinaryOperator = "+" | "===" | "&&";

export type TsBinaryExpressionAst = {
  readonly kind: "binaryExpression";
  readonly operatorToken: TsBinaryOperator;
  readonly left: TsExpressionAst;
  readonly right: TsExpressionAst;
};

export type TsNewExpressionAst = {
  readonly kind: "newExpression";
  readonly expression: TsExpressionAst;
  readonly arguments: readonly TsExpressionAst[];
};

export type TsPropertyAssignmentAst = {
  readonly kind: "propertyAssignment";
  readonly name: string;
  readonly value: TsExpressionAst;
};

export type TsParameterAst = {
  readonly name: string;
  readonly type: TsTypeAst;
};

export type TsMethodAst = {
  readonly kind: "method";
  readonly name: string;
  readonly parameters: readonly TsParameterAst[];
  readonly returnType: TsTypeAst | "void";
  readonly body: TsBlockStatementAst;
};

export type TsObjectMemberAst = TsPropertyAssignmentAst | TsMethodAst;

export type TsObjectLiteralExpressionAst = {
  readonly kind: "objectLiteralExpression";
  readonly members: readonly TsObjectMemberAst[];
};

export type TsArrayLiteralExpressionAst = {
  readonly kind: "arrayLiteralExpression";
  readonly elements: readonly TsExpressionAst[];
};

export type TsArrowFunctionExpressionAst = {
  readonly kind: "arrowFunctionExpression";
  readonly typeParameters?: readonly TsTypeParameterAst[];
  readonly parameters: readonly TsParameterAst[];
  readonly returnType: TsTypeAst;
  readonly body: TsBlockStatementAst;
};

export type TsExpressionAst =
  | TsLiteralExpressionAst
  | TsIdentifierExpressionAst
  | TsReferenceExpressionAst
  | TsMemberAccessExpressionAst
  | TsElementAccessExpressionAst
  | TsInvocationExpressionAst
  | TsBinaryExpressionAst
  | TsNewExpressionAst
  | TsObjectLiteralExpressionAst
  | TsArrayLiteralExpressionAst
  | TsArrowFunctionExpressionAst;

// ============================================================
// Statement AST
// ============================================================

export type TsBlockStatementAst = {
  readonly kind: "blockStatement";
  readonly statements: readonly TsStatementAst[];
};

export type TsConstStatementAst = {
  readonly kind: "constStatement";
  /** A single name, or the elements of an array binding pattern */
  readonly binding: string | readonly string[];
  readonly type?: TsTypeAst;
  readonly initializer: TsExpressionAst;
};

export type TsExpressionStatementAst = {
  readonly kind: "expressionStatement";
  readonly expression: TsExpressionAst;
};

export type TsReturnStatementAst = {
  readonly kind: "returnStatement";
  readonly expression?: TsExpressionAst;
};

export type TsIfStatementAst = {
  readonly kind: "ifStatement";
  readonly condition: TsExpressionAst;
  readonly thenStatement: TsBlockStatementAst;
};

export type TsThrowStatementAst = {
  readonly kind: "throwStatement";
  readonly expression: TsExpressionAst;
};

export type TsStatementAst =
  | TsBlockStatementAst
  | TsConstStatementAst
  | TsExpressionStatementAst
  | TsReturnStatementAst
  | TsIfStatementAst
  | TsThrowStatementAst;

// ============================================================
// Declaration AST (module level)
// ============================================================

export type TsInterfaceMemberAst = {
  readonly name: string;
  readonly type: TsTypeAst;
};

export type TsInterfaceDeclarationAst = {
  readonly kind: "interfaceDeclaration";
  readonly name: string;
  readonly typeParameters?: readonly TsTypeParameterAst[];
  readonly members: readonly TsInterfaceMemberAst[];
};

export type TsTypeAliasDeclarationAst = {
  readonly kind: "typeAliasDeclaration";
  readonly name: string;
  readonly typeParameters?: readonly TsTypeParameterAst[];
  readonly type: TsTypeAst;
};

export type TsConstDeclarationAst = {
  readonly kind: "constDeclaration";
  readonly name: string;
  readonly type?: TsTypeAst;
  readonly initializer: TsExpressionAst;
};

/** Generated declarations are always exported */
export type TsDeclarationAst =
  | TsInterfaceDeclarationAst
  | TsTypeAliasDeclarationAst
  | TsConstDeclarationAst;

export type TsImportSpecifierAst = {
  readonly name: string;
  /** Set when the import renames: `importedName as name` */
  readonly importedName?: string;
  readonly typeOnly: boolean;
};

export type TsImportDeclarationAst =
  | {
      readonly kind: "namedImport";
      readonly module: string;
      readonly specifiers: readonly TsImportSpecifierAst[];
    }
  | {
      readonly kind: "defaultImport";
      readonly module: string;
      readonly name: string;
      readonly typeOnly: boolean;
    }
  | {
      readonly kind: "namespaceImport";
      readonly module: string;
      readonly name: string;
      readonly typeOnly: boolean;
    };

// ============================================================
// Top-level module
// ============================================================

export type TsModuleAst = {
  readonly kind: "module";
  readonly headerText?: string;
  readonly imports: readonly TsImportDeclarationAst[];
  readonly declarations: readonly TsDeclarationAst[];
};
