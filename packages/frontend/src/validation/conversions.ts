/**
 * AmbiguousConversion checks
 *
 * Only mismatches visible from the declarations are reported here. A
 * converter that does not fit its input otherwise surfaces when the
 * generated module is type checked.
 */

import { createDiagnostic, Diagnostic } from "../types/diagnostic.js";
import { renderTypePath, samePath, TypePath } from "../types/type-path.js";
import { tableFields, type FieldMappingTable, type FieldSpec } from "../ir/types.js";
import type { ConverterRegistry, ValidationRule } from "./types.js";

/**
 * Registry key of a path: its segments, without type arguments, with one
 * `[]` per array level.
 */
export const registryKey = (path: TypePath): string =>
  `${path.segments.join(".")}${"[]".repeat(path.arrayDepth)}`;

/**
 * The converter that receives the remote value: the mirror type itself,
 * or the innermost of a via chain.
 */
const innermostConverter = (field: FieldSpec): TypePath | undefined => {
  switch (field.converter.kind) {
    case "identity":
      return undefined;
    case "self":
      return field.converter.path;
    case "via":
      return field.converter.paths[field.converter.paths.length - 1];
  }
};

const checkField = (
  table: FieldMappingTable,
  label: string,
  field: FieldSpec,
  registry: ConverterRegistry
): Diagnostic | undefined => {
  const target = {
    location: field.location,
    typeName: table.typeName,
    fieldName: label,
  };

  const fromType = field.fromType;
  const sameAsInput = fromType && field.via?.find((path) => samePath(path, fromType));
  if (sameAsInput) {
    return createDiagnostic(
      "AW2003",
      "error",
      `converter '${renderTypePath(sameAsInput)}' is the remote field type itself`,
      target,
      "name a converter type in via(...), not the type being converted"
    );
  }

  if (
    field.converter.kind === "self" &&
    field.fromType &&
    samePath(field.fromType, field.mirrorType)
  ) {
    return createDiagnostic(
      "AW2003",
      "error",
      `'${renderTypePath(field.mirrorType)}' cannot convert from itself`,
      target,
      "drop from(...) or declare the field with its mirror type"
    );
  }

  if (field.converter.kind === "self" && field.mirrorType.arrayDepth > 0) {
    return createDiagnostic(
      "AW2003",
      "error",
      `'${renderTypePath(field.mirrorType)}' is not a mirror type and cannot convert '${renderTypePath(field.inputType)}'`,
      target,
      "name a converter for the field with via(...)"
    );
  }

  const converter = innermostConverter(field);
  const key = converter && registryKey(converter);
  const entry = key && Object.hasOwn(registry, key) ? registry[key] : undefined;
  if (key && entry) {
    const input = registryKey(field.inputType);
    if (!entry.accepts.includes(input)) {
      return createDiagnostic(
        "AW2003",
        "error",
        `converter '${key}' does not accept '${renderTypePath(field.inputType)}'`,
        target,
        `accepted input types: ${entry.accepts.join(", ")}`
      );
    }
  }

  return undefined;
};

export const validateConversions: ValidationRule = (table, options) => {
  const registry = options.converters ?? {};
  return tableFields(table).flatMap(({ label, field }) => {
    const diagnostic = checkField(table, label, field, registry);
    return diagnostic ? [diagnostic] : [];
  });
};
