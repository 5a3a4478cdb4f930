/**
 * A field converted by its own mirror type uses that mirror's generated
 * adapters, which live beside the mirror's declaration. The mirror has to
 * be declared in this file or imported by name from a relative module.
 */

import { createDiagnostic, Diagnostic } from "../types/diagnostic.js";
import { pathHead, renderTypePath } from "../types/type-path.js";
import { tableFields, type FieldSpec } from "../ir/types.js";
import type { SourceReferences } from "../source/types.js";
import type { ValidationRule } from "./types.js";

const unresolvedReason = (
  field: FieldSpec,
  references: SourceReferences
): string | undefined => {
  if (field.converter.kind !== "self") return undefined;

  const mirror = renderTypePath(field.mirrorType);
  const reference = references.get(pathHead(field.mirrorType));
  if (reference === undefined) {
    return `nested mirror '${mirror}' is neither declared nor imported in this file`;
  }

  switch (reference.kind) {
    case "local":
      return undefined;
    case "named":
      return reference.module.startsWith(".")
        ? undefined
        : `nested mirror '${mirror}' is imported from package '${reference.module}'; only relative modules have generated adapters`;
    case "default":
    case "namespace":
      return `nested mirror '${mirror}' must be imported by name`;
  }
};

export const validateNestedMirrors: ValidationRule = (table, options) => {
  const references = options.references;
  if (!references) return [];

  return tableFields(table).flatMap(({ label, field }): readonly Diagnostic[] => {
    const reason = unresolvedReason(field, references);
    return reason === undefined
      ? []
      : [
          createDiagnostic("AW2005", "error", reason, {
            location: field.location,
            typeName: table.typeName,
            fieldName: label,
          }),
        ];
  });
};
