/**
 * Per-type pipeline - Directive Model, IR Builder, Validator
 *
 * Each declaration is compiled in isolation; a failure in one never
 * affects another.
 */

import { createDiagnostic, Diagnostic } from "./types/diagnostic.js";
import { parseDirectiveModel } from "./directives/parser.js";
import type { RawTypeDecl } from "./directives/types.js";
import { buildFieldMappingTable } from "./ir/builder.js";
import { tableFields, type ValidatedTable } from "./ir/types.js";
import { flatMap } from "./types/result.js";
import { validateTable } from "./validation/orchestrator.js";
import type { ValidationOptions } from "./validation/types.js";

export type TypeSpecOutcome = {
  readonly typeName: string;
  /** Present only when no error was reported for the type */
  readonly table?: ValidatedTable;
  readonly diagnostics: readonly Diagnostic[];
};

const notReconstructable = (table: ValidatedTable): Diagnostic => {
  const getterFields = tableFields(table)
    .filter(({ field }) => !field.reconstructable)
    .map(({ label }) => label);

  return createDiagnostic(
    "AW3001",
    "info",
    `no deserialize adapter for '${table.typeName}': fields read through getters: ${getterFields.join(", ")}`,
    { location: table.location, typeName: table.typeName }
  );
};

export const compileTypeDecl = (
  decl: RawTypeDecl,
  options: ValidationOptions = {}
): TypeSpecOutcome => {
  const validated = flatMap(parseDirectiveModel(decl), (model) =>
    validateTable(buildFieldMappingTable(decl, model), options)
  );
  if (!validated.ok) {
    return { typeName: decl.name, diagnostics: validated.error };
  }

  const table = validated.value;
  return {
    typeName: decl.name,
    table,
    diagnostics: table.fullyReconstructable ? [] : [notReconstructable(table)],
  };
};

export const compileTypeDecls = (
  decls: readonly RawTypeDecl[],
  options: ValidationOptions = {}
): readonly TypeSpecOutcome[] => decls.map((decl) => compileTypeDecl(decl, options));
