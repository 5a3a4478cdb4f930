/**
 * Deserialize unit - rebuilds remote values from their archived form
 *
 * Only emitted for fully reconstructable mirrors: every field is assigned
 * directly, so a field read through a getter has nowhere to go.
 */

import type {
  MirrorShape,
  TypePath,
  ValidatedFieldSpec,
  ValidatedTable,
} from "@archive-with/frontend";
import {
  arrayLiteral,
  arrowFunction,
  constDeclaration,
  constStatement,
  globalBinding,
  identifier,
  ifStatement,
  memberAccess,
  newExpression,
  objectLiteral,
  parameter,
  property,
  reference,
  returnStatement,
  strictEquals,
  stringLiteral,
  throwStatement,
  TsDeclarationAst,
  TsExpressionAst,
  TsStatementAst,
  TsTypeAst,
} from "../core/format/backend-ast/index.js";
import { runtimeType } from "../core/runtime.js";
import { renderConverter } from "../core/converters.js";
import { declareTypeParameters, generatedType, typeFromPath } from "../core/bindings.js";
import { fieldOf } from "../core/access.js";
import { archivedName, deserializeName } from "../core/naming.js";
import type { EmitterContext } from "../types.js";

const emitRemoteValue = (
  context: EmitterContext,
  shape: MirrorShape,
  fields: readonly ValidatedFieldSpec[],
  tag?: { readonly key: string; readonly value: string }
): TsExpressionAst => {
  const values = fields.map((field) => ({
    name: field.name,
    value: renderConverter(context, field).deserialize(
      fieldOf(identifier("field"), shape, field.name),
      identifier("deserializer")
    ),
  }));

  return shape === "tuple"
    ? arrayLiteral(values.map((v) => v.value))
    : objectLiteral([
        ...(tag ? [property(tag.key, stringLiteral(tag.value))] : []),
        ...values.map((v) => property(v.name, v.value)),
      ]);
};

const buildAndReturn = (value: TsExpressionAst, remoteType: TsTypeAst): readonly TsStatementAst[] => [
  constStatement("value", value, remoteType),
  returnStatement(identifier("value")),
];

const emitBody = (
  context: EmitterContext,
  table: ValidatedTable,
  remoteType: TsTypeAst
): readonly TsStatementAst[] =>
  table.shape === "enum"
    ? [
        ...table.variants.map((variant) =>
          ifStatement(
            strictEquals(memberAccess(identifier("field"), table.tagKey), stringLiteral(variant.tag)),
            buildAndReturn(
              emitRemoteValue(context, "named", variant.fields, {
                key: table.tagKey,
                value: variant.tag,
              }),
              remoteType
            )
          )
        ),
        throwStatement(
          newExpression(reference("Error", globalBinding), [
            stringLiteral(`unknown variant of ${archivedName(table.typeName)}`),
          ])
        ),
      ]
    : buildAndReturn(emitRemoteValue(context, table.shape, table.fields), remoteType);

export const emitDeserializer = (
  context: EmitterContext,
  table: ValidatedTable,
  remote: TypePath
): TsDeclarationAst => {
  const remoteType = typeFromPath(context, remote);

  return constDeclaration(
    deserializeName(table.typeName, remote),
    arrowFunction(
      [
        parameter("field", generatedType(archivedName(table.typeName), table)),
        parameter("deserializer", runtimeType(context, "Deserializer")),
      ],
      remoteType,
      emitBody(context, table, remoteType),
      declareTypeParameters(context, table)
    )
  );
};

/**
 * Empty unless the mirror is fully reconstructable.
 */
export const emitDeserializers = (
  context: EmitterContext,
  table: ValidatedTable
): readonly TsDeclarationAst[] =>
  table.fullyReconstructable
    ? table.remoteTypes.map((remote) => emitDeserializer(context, table, remote))
    : [];
