/**
 * Validation orchestrator - runs every table rule and finalizes the table
 */

import {
  addDiagnostics,
  createDiagnosticsCollector,
  Diagnostic,
} from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";
import {
  tableFields,
  type FieldMappingTable,
  type FieldSpec,
  type ValidatedFieldSpec,
  type ValidatedTable,
} from "../ir/types.js";
import type { ValidationOptions, ValidationRule } from "./types.js";
import {
  validateRemoteTypesDistinct,
  validateRemoteTypesPresent,
} from "./remote-types.js";
import { validateGetterOwnership } from "./getters.js";
import { validateConversions } from "./conversions.js";
import { validateNestedMirrors } from "./nested-mirrors.js";

const validationRules: readonly ValidationRule[] = [
  validateRemoteTypesPresent,
  validateRemoteTypesDistinct,
  validateGetterOwnership,
  validateConversions,
  validateNestedMirrors,
];

/**
 * A field read through a getter has no public field to assign on the way
 * back.
 */
const markReconstructable = (field: FieldSpec): ValidatedFieldSpec => ({
  ...field,
  reconstructable: field.access.kind === "field",
});

/**
 * Validate a draft table. Every rule runs; all failures are returned
 * together.
 */
export const validateTable = (
  table: FieldMappingTable,
  options: ValidationOptions = {}
): Result<ValidatedTable, readonly Diagnostic[]> => {
  const collector = validationRules.reduce(
    (acc, rule) => addDiagnostics(acc, rule(table, options)),
    createDiagnosticsCollector()
  );

  if (collector.hasErrors) {
    return error(collector.diagnostics);
  }

  const validated = {
    ...table,
    fields: table.fields.map(markReconstructable),
    variants: table.variants.map((variant) => ({
      ...variant,
      fields: variant.fields.map(markReconstructable),
    })),
  };
  return ok({
    ...validated,
    fullyReconstructable: tableFields(validated).every(({ field }) => field.reconstructable),
  });
};
