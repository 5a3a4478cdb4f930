import { createDiagnostic } from "../types/diagnostic.js";
import { tableFields } from "../ir/types.js";
import type { ValidationRule } from "./types.js";

export const validateGetterOwnership: ValidationRule = (table) =>
  tableFields(table)
    .filter(({ field }) => field.getterOwned && field.getter === undefined)
    .map(({ label, field }) =>
      createDiagnostic(
        "AW2002",
        "error",
        "'getter_owned' requires a 'getter' on the same field",
        {
          location: field.location,
          typeName: table.typeName,
          fieldName: label,
        },
        'add getter = "module.readField" or remove getter_owned'
      )
    );
