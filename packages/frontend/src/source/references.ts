/**
 * Name bindings of a source file: imports and top-level declarations
 */

import * as ts from "typescript";
import type { SourceReference, SourceReferences } from "./types.js";

const importReferences = (
  declaration: ts.ImportDeclaration
): readonly SourceReference[] => {
  const clause = declaration.importClause;
  if (!clause || !ts.isStringLiteral(declaration.moduleSpecifier)) {
    return [];
  }

  const module = declaration.moduleSpecifier.text;
  const references: SourceReference[] = [];

  if (clause.name) {
    references.push({ kind: "default", name: clause.name.text, module });
  }

  const bindings = clause.namedBindings;
  if (bindings && ts.isNamespaceImport(bindings)) {
    references.push({ kind: "namespace", name: bindings.name.text, module });
  } else if (bindings) {
    for (const element of bindings.elements) {
      references.push({
        kind: "named",
        name: element.name.text,
        importedName: (element.propertyName ?? element.name).text,
        module,
      });
    }
  }

  return references;
};

const declaredNames = (statement: ts.Statement): readonly string[] => {
  if (
    ts.isInterfaceDeclaration(statement) ||
    ts.isTypeAliasDeclaration(statement) ||
    ts.isEnumDeclaration(statement)
  ) {
    return [statement.name.text];
  }
  if (ts.isClassDeclaration(statement) || ts.isFunctionDeclaration(statement)) {
    return statement.name ? [statement.name.text] : [];
  }
  if (ts.isVariableStatement(statement)) {
    return statement.declarationList.declarations.flatMap((declaration) =>
      ts.isIdentifier(declaration.name) ? [declaration.name.text] : []
    );
  }
  return [];
};

export const collectReferences = (sourceFile: ts.SourceFile): SourceReferences => {
  const references = new Map<string, SourceReference>();

  for (const statement of sourceFile.statements) {
    const found = ts.isImportDeclaration(statement)
      ? importReferences(statement)
      : declaredNames(statement).map(
          (name): SourceReference => ({ kind: "local", name })
        );

    for (const reference of found) {
      references.set(reference.name, reference);
    }
  }

  return references;
};
