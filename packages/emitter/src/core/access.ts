/**
 * Field access on remote values, archived values and resolvers
 */

import type { MirrorShape, ValidatedFieldSpec } from "@archive-with/frontend";
import {
  elementAccess,
  invocation,
  memberAccess,
  numericLiteral,
  stringLiteral,
  TsExpressionAst,
} from "./format/backend-ast/index.js";
import { callRuntime } from "./runtime.js";
import { valueFromPath } from "./bindings.js";
import type { EmitterContext } from "../types.js";

/**
 * Key of a field in `outField` calls: the name, or the index of a tuple
 * element.
 */
export const fieldKey = (shape: MirrorShape, name: string): TsExpressionAst =>
  shape === "tuple" ? numericLiteral(Number(name)) : stringLiteral(name);

/**
 * `base.name`, or `base[index]` for tuples
 */
export const fieldOf = (
  base: TsExpressionAst,
  shape: MirrorShape,
  name: string
): TsExpressionAst =>
  shape === "tuple" ? elementAccess(base, numericLiteral(Number(name))) : memberAccess(base, name);

/**
 * Read a field's value out of a remote instance. A getter wins over direct
 * access; an owned getter is handed a clone.
 */
export const readRemoteValue = (
  context: EmitterContext,
  field: ValidatedFieldSpec,
  shape: MirrorShape,
  remote: TsExpressionAst
): TsExpressionAst => {
  switch (field.access.kind) {
    case "field":
      return fieldOf(remote, shape, field.name);
    case "getter":
      return invocation(valueFromPath(context, field.access.path), [
        field.access.owned ? callRuntime(context, "clone", [remote]) : remote,
      ]);
  }
};
