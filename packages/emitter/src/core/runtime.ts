/**
 * Runtime contract
 *
 * Generated code imports these names from the configured runtime module.
 * Converter values expose `serializeWith`, `resolveWith` and
 * `deserializeWith`; the identity path goes through the plain functions.
 * A runtime name the source file already uses is imported under a `__`
 * alias.
 */

import {
  invocation,
  reference,
  runtimeBinding,
  typeReference,
  TsExpressionAst,
  TsTypeAst,
  TsTypeReferenceAst,
} from "./format/backend-ast/index.js";
import type { EmitterContext } from "../types.js";

const RUNTIME_VALUES = [
  "serialize",
  "resolve",
  "deserialize",
  "outField",
  "outVariant",
  "clone",
  "compose",
] as const;

const RUNTIME_TYPES = [
  "Archived",
  "Resolver",
  "ArchivedWith",
  "ResolverWith",
  "ArchiveWith",
  "SerializeWith",
  "Serializer",
  "Deserializer",
  "Place",
  "Compose",
] as const;

type RuntimeValue = (typeof RUNTIME_VALUES)[number];
type RuntimeType = (typeof RUNTIME_TYPES)[number];

/**
 * Local name of a runtime import: `Resolver`, or `__Resolver` when the
 * source file binds `Resolver` itself.
 */
const runtimeLocalName = (context: EmitterContext, name: string): string => {
  if (!context.reservedNames.has(name)) return name;
  let alias = `__${name}`;
  for (let suffix = 2; context.reservedNames.has(alias); suffix++) {
    alias = `__${name}_${suffix}`;
  }
  return alias;
};

export const runtimeType = (
  context: EmitterContext,
  name: RuntimeType,
  typeArguments: readonly TsTypeAst[] = []
): TsTypeReferenceAst =>
  typeReference(runtimeLocalName(context, name), runtimeBinding(name), typeArguments);

const runtimeValue = (context: EmitterContext, name: RuntimeValue): TsExpressionAst =>
  reference(runtimeLocalName(context, name), runtimeBinding(name));

export const callRuntime = (
  context: EmitterContext,
  name: RuntimeValue,
  args: readonly TsExpressionAst[],
  typeArguments: readonly TsTypeAst[] = []
): TsExpressionAst => invocation(runtimeValue(context, name), args, typeArguments);
