/**
 * Converter rendering
 *
 * One rendering per field converter kind, shared by the representation,
 * archive and deserialize emitters so that all three agree on the types
 * and calls a field uses.
 *
 * | kind     | archived / resolver type        | calls                         |
 * | -------- | ------------------------------- | ----------------------------- |
 * | identity | Archived<T> / Resolver<T>       | serialize<T>(...) etc.        |
 * | via C    | ArchivedWith<In, C> / ...With   | C.serializeWith(...) etc.     |
 * | via A, B | ArchivedWith<In, Compose<A, B>> | compose(A, B).serializeWith   |
 * | self N   | ArchivedN / NResolver           | NFromIn.serializeWith(...),   |
 * |          |                                 | deserializeNFromIn(...)       |
 *
 * A generic nested mirror passes its type arguments on:
 * `ArchivedN<T>`, `NFromIn<T>().serializeWith(...)`.
 */

import type { TypePath, ValidatedFieldSpec } from "@archive-with/frontend";
import {
  invocation,
  memberAccess,
  reference,
  typeReference,
  TsExpressionAst,
  TsTypeAst,
} from "./format/backend-ast/index.js";
import { callRuntime, runtimeType } from "./runtime.js";
import { resolveNestedMirror, typeFromPath, valueFromPath } from "./bindings.js";
import { adapterName, archivedName, deserializeName, resolverName } from "./naming.js";
import type { EmitterContext } from "../types.js";

export type ConverterRendering = {
  readonly archivedType: TsTypeAst;
  readonly resolverType: TsTypeAst;
  readonly serialize: (
    value: TsExpressionAst,
    serializer: TsExpressionAst
  ) => TsExpressionAst;
  readonly resolve: (
    value: TsExpressionAst,
    pos: TsExpressionAst,
    resolver: TsExpressionAst,
    out: TsExpressionAst
  ) => TsExpressionAst;
  readonly deserialize: (
    archived: TsExpressionAst,
    deserializer: TsExpressionAst
  ) => TsExpressionAst;
};

type ConverterChain = {
  readonly value: TsExpressionAst;
  readonly type: TsTypeAst;
};

/**
 * `via(A, B, C)` -> `compose(A, compose(B, C))`, typed
 * `Compose<A, Compose<B, C>>`
 */
const renderChain = (context: EmitterContext, paths: readonly TypePath[]): ConverterChain => {
  const links = paths.map((path) => ({
    value: valueFromPath(context, path),
    type: typeFromPath(context, path),
  }));
  const innermost = links[links.length - 1];
  if (!innermost) {
    throw new Error("ICE: via converter without paths");
  }

  return links.slice(0, -1).reduceRight<ConverterChain>(
    (inner, outer) => ({
      value: callRuntime(context, "compose", [outer.value, inner.value]),
      type: runtimeType(context, "Compose", [outer.type, inner.type]),
    }),
    innermost
  );
};

/**
 * Converter object exposing `serializeWith`, `resolveWith` and
 * `deserializeWith`.
 */
const withConverterObject = (
  converter: TsExpressionAst,
  archivedType: TsTypeAst,
  resolverType: TsTypeAst,
  deserialize: ConverterRendering["deserialize"]
): ConverterRendering => ({
  archivedType,
  resolverType,
  serialize: (value, serializer) =>
    invocation(memberAccess(converter, "serializeWith"), [value, serializer]),
  resolve: (value, pos, resolver, out) =>
    invocation(memberAccess(converter, "resolveWith"), [value, pos, resolver, out]),
  deserialize,
});

export const renderConverter = (
  context: EmitterContext,
  field: ValidatedFieldSpec
): ConverterRendering => {
  const converter = field.converter;

  switch (converter.kind) {
    case "identity": {
      const type = typeFromPath(context, field.mirrorType);
      return {
        archivedType: runtimeType(context, "Archived", [type]),
        resolverType: runtimeType(context, "Resolver", [type]),
        serialize: (value, serializer) =>
          callRuntime(context, "serialize", [value, serializer], [type]),
        resolve: (value, pos, resolver, out) =>
          callRuntime(context, "resolve", [value, pos, resolver, out], [type]),
        deserialize: (archived, deserializer) =>
          callRuntime(context, "deserialize", [archived, deserializer], [type]),
      };
    }

    case "via": {
      const chain = renderChain(context, converter.paths);
      const typeArgs = [typeFromPath(context, field.inputType), chain.type];
      return withConverterObject(
        chain.value,
        runtimeType(context, "ArchivedWith", typeArgs),
        runtimeType(context, "ResolverWith", typeArgs),
        (archived, deserializer) =>
          invocation(memberAccess(chain.value, "deserializeWith"), [archived, deserializer])
      );
    }

    case "self": {
      const mirror = resolveNestedMirror(context, converter.path);
      const typeArgs = converter.path.typeArguments.map((arg) => typeFromPath(context, arg));
      const adapter = reference(adapterName(mirror.baseName, field.inputType), mirror.binding);
      return withConverterObject(
        mirror.generic ? invocation(adapter, [], typeArgs) : adapter,
        typeReference(archivedName(mirror.baseName), mirror.binding, typeArgs),
        typeReference(resolverName(mirror.baseName), mirror.binding, typeArgs),
        (archived, deserializer) =>
          invocation(
            reference(deserializeName(mirror.baseName, field.inputType), mirror.binding),
            [archived, deserializer],
            typeArgs
          )
      );
    }
  }
};
