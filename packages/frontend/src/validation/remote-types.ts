/**
 * Type-level rules: at least one remote type, distinct adapter names
 */

import { createDiagnostic, Diagnostic } from "../types/diagnostic.js";
import { pathName, renderTypePath, TypePath } from "../types/type-path.js";
import type { ValidationRule } from "./types.js";

export const validateRemoteTypesPresent: ValidationRule = (table) =>
  table.remoteTypes.length === 0
    ? [
        createDiagnostic(
          "AW2001",
          "error",
          `mirror type '${table.typeName}' names no remote type`,
          { location: table.location, typeName: table.typeName },
          "add a type-level directive such as from(Remote)"
        ),
      ]
    : [];

/**
 * Adapters are named after the last path segment, so `a.Remote` and
 * `b.Remote<u8>` collide.
 */
export const validateRemoteTypesDistinct: ValidationRule = (table) => {
  const seen = new Map<string, TypePath>();
  const diagnostics: Diagnostic[] = [];

  for (const remote of table.remoteTypes) {
    const name = pathName(remote);
    const previous = seen.get(name);
    if (previous === undefined) {
      seen.set(name, remote);
      continue;
    }
    diagnostics.push(
      createDiagnostic(
        "AW2004",
        "error",
        `remote types '${renderTypePath(previous)}' and '${renderTypePath(remote)}' both produce adapter '${table.typeName}From${name}'`,
        { location: table.location, typeName: table.typeName }
      )
    );
  }

  return diagnostics;
};
