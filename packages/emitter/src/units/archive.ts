/**
 * Archive/Serialize unit - one adapter object per remote type
 *
 * `serializeWith` reads every field out of the remote value and
 * serializes it through the field's converter; `resolveWith` re-reads each
 * field and resolves it at the field's offset in the output. Union mirrors
 * branch on the tag property first. A generic mirror's adapter is a factory
 * taking the mirror's type parameters.
 */

import {
  renderTypePath,
  type MirrorShape,
  type TypePath,
  type ValidatedFieldSpec,
  type ValidatedTable,
  type ValidatedVariantSpec,
} from "@archive-with/frontend";
import {
  and,
  arrowFunction,
  block,
  constDeclaration,
  constStatement,
  expressionStatement,
  globalBinding,
  identifier,
  ifStatement,
  intersectionType,
  memberAccess,
  method,
  newExpression,
  objectLiteral,
  parameter,
  plus,
  property,
  reference,
  returnStatement,
  strictEquals,
  stringLiteral,
  throwStatement,
  typeReference,
  TsConstStatementAst,
  TsDeclarationAst,
  TsExpressionAst,
  TsMethodAst,
  TsStatementAst,
  TsTypeAst,
} from "../core/format/backend-ast/index.js";
import { callRuntime, runtimeType } from "../core/runtime.js";
import { renderConverter } from "../core/converters.js";
import { declareTypeParameters, generatedType, typeFromPath } from "../core/bindings.js";
import { fieldKey, fieldOf, readRemoteValue } from "../core/access.js";
import {
  adapterName,
  archivedName,
  archivedVariantName,
  createLocalNames,
  resolverName,
} from "../core/naming.js";
import type { EmitterContext } from "../types.js";

type AdapterTypes = {
  readonly remote: TsTypeAst;
  readonly archived: TsTypeAst;
  readonly resolver: TsTypeAst;
};

const readInto = (
  context: EmitterContext,
  shape: MirrorShape,
  field: ValidatedFieldSpec,
  local: string
): TsConstStatementAst =>
  constStatement(
    local,
    readRemoteValue(context, field, shape, identifier("field")),
    typeFromPath(context, field.inputType)
  );

const tagTest = (table: ValidatedTable, target: string, tag: string): TsExpressionAst =>
  strictEquals(memberAccess(identifier(target), table.tagKey), stringLiteral(tag));

const throwError = (message: string): TsStatementAst =>
  throwStatement(newExpression(reference("Error", globalBinding), [stringLiteral(message)]));

/**
 * Reads every field into a local, then returns the resolver object.
 */
const serializeFields = (
  context: EmitterContext,
  shape: MirrorShape,
  fields: readonly ValidatedFieldSpec[],
  tag?: { readonly key: string; readonly value: string }
): readonly TsStatementAst[] => {
  const localName = createLocalNames();
  const locals = fields.map((field) => ({ field, local: localName(field.name) }));

  return [
    ...locals.map(({ field, local }) => readInto(context, shape, field, local)),
    returnStatement(
      objectLiteral([
        ...(tag ? [property(tag.key, stringLiteral(tag.value))] : []),
        ...locals.map(({ field, local }) =>
          property(
            field.name,
            renderConverter(context, field).serialize(identifier(local), identifier("serializer"))
          )
        ),
      ])
    ),
  ];
};

const emitSerializeWith = (
  context: EmitterContext,
  table: ValidatedTable,
  remote: TypePath,
  types: AdapterTypes
): TsMethodAst => {
  const statements =
    table.shape === "enum"
      ? [
          ...table.variants.map((variant) =>
            ifStatement(
              tagTest(table, "field", variant.tag),
              serializeFields(context, "named", variant.fields, {
                key: table.tagKey,
                value: variant.tag,
              })
            )
          ),
          throwError(`unknown variant of ${renderTypePath(remote)}`),
        ]
      : serializeFields(context, table.shape, table.fields);

  return method(
    "serializeWith",
    [
      parameter("field", types.remote),
      parameter("serializer", runtimeType(context, "Serializer")),
    ],
    types.resolver,
    statements
  );
};

const emitResolveField = (
  context: EmitterContext,
  shape: MirrorShape,
  field: ValidatedFieldSpec,
  out: TsExpressionAst
): TsStatementAst =>
  block([
    constStatement(
      ["fp", "fo"],
      callRuntime(context, "outField", [out, fieldKey(shape, field.name)])
    ),
    readInto(context, shape, field, "__field"),
    expressionStatement(
      renderConverter(context, field).resolve(
        identifier("__field"),
        plus(identifier("pos"), identifier("fp")),
        fieldOf(identifier("resolver"), shape, field.name),
        identifier("fo")
      )
    ),
  ]);

/**
 * Selects the variant's place in the output, writing its tag, then
 * resolves the variant's fields inside it.
 */
const resolveVariant = (
  context: EmitterContext,
  table: ValidatedTable,
  variant: ValidatedVariantSpec
): readonly TsStatementAst[] => {
  const place = callRuntime(
    context,
    "outVariant",
    [identifier("out"), stringLiteral(variant.tag)],
    [generatedType(archivedVariantName(table.typeName, variant.name), table)]
  );

  if (variant.fields.length === 0) {
    return [expressionStatement(place), returnStatement()];
  }

  return [
    constStatement("variant", place),
    ...variant.fields.map((field) =>
      emitResolveField(context, "named", field, identifier("variant"))
    ),
    returnStatement(),
  ];
};

const emitResolveWith = (
  context: EmitterContext,
  table: ValidatedTable,
  remote: TypePath,
  types: AdapterTypes
): TsMethodAst => {
  const statements =
    table.shape === "enum"
      ? [
          ...table.variants.map((variant) =>
            ifStatement(
              and(tagTest(table, "field", variant.tag), tagTest(table, "resolver", variant.tag)),
              resolveVariant(context, table, variant)
            )
          ),
          throwError(`resolver does not match the variant of ${renderTypePath(remote)}`),
        ]
      : table.fields.map((field) =>
          emitResolveField(context, table.shape, field, identifier("out"))
        );

  return method(
    "resolveWith",
    [
      parameter("field", types.remote),
      parameter("pos", typeReference("number", globalBinding)),
      parameter("resolver", types.resolver),
      parameter("out", runtimeType(context, "Place", [types.archived])),
    ],
    "void",
    statements
  );
};

export const emitArchiveAdapter = (
  context: EmitterContext,
  table: ValidatedTable,
  remote: TypePath
): TsDeclarationAst => {
  const types: AdapterTypes = {
    remote: typeFromPath(context, remote),
    archived: generatedType(archivedName(table.typeName), table),
    resolver: generatedType(resolverName(table.typeName), table),
  };

  const adapter = objectLiteral([
    emitSerializeWith(context, table, remote, types),
    emitResolveWith(context, table, remote, types),
  ]);
  const adapterType = intersectionType([
    runtimeType(context, "ArchiveWith", [types.remote, types.archived, types.resolver]),
    runtimeType(context, "SerializeWith", [types.remote, types.resolver]),
  ]);
  const name = adapterName(table.typeName, remote);

  return table.typeParameters.length > 0
    ? constDeclaration(
        name,
        arrowFunction([], adapterType, [returnStatement(adapter)], declareTypeParameters(context, table))
      )
    : constDeclaration(name, adapter, adapterType);
};

/**
 * One adapter per remote type, in declaration order.
 */
export const emitArchiveAdapters = (
  context: EmitterContext,
  table: ValidatedTable
): readonly TsDeclarationAst[] =>
  table.remoteTypes.map((remote) => emitArchiveAdapter(context, table, remote));
