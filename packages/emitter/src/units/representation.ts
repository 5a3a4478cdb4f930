/**
 * Representation unit - archived form and resolver of a mirror type
 *
 * Both interfaces have one readonly member per field, in declaration
 * order, typed by the field's converter. A union mirror gets one pair of
 * interfaces per variant, led by the tag property, and a union alias over
 * each set.
 */

import type { ValidatedFieldSpec, ValidatedTable } from "@archive-with/frontend";
import {
  interfaceDeclaration,
  literalType,
  typeAliasDeclaration,
  unionType,
  TsDeclarationAst,
  TsInterfaceMemberAst,
} from "../core/format/backend-ast/index.js";
import { renderConverter } from "../core/converters.js";
import { declareTypeParameters, generatedType } from "../core/bindings.js";
import {
  archivedName,
  archivedVariantName,
  resolverName,
  resolverVariantName,
} from "../core/naming.js";
import type { EmitterContext } from "../types.js";

type Members = {
  readonly archived: readonly TsInterfaceMemberAst[];
  readonly resolver: readonly TsInterfaceMemberAst[];
};

const fieldMembers = (
  context: EmitterContext,
  fields: readonly ValidatedFieldSpec[]
): Members => {
  const rendered = fields.map((field) => ({
    name: field.name,
    rendering: renderConverter(context, field),
  }));
  return {
    archived: rendered.map((f) => ({ name: f.name, type: f.rendering.archivedType })),
    resolver: rendered.map((f) => ({ name: f.name, type: f.rendering.resolverType })),
  };
};

const emitUnionRepresentation = (
  context: EmitterContext,
  table: ValidatedTable
): readonly TsDeclarationAst[] => {
  const typeParameters = declareTypeParameters(context, table);
  const variants = table.variants.map((variant) => {
    const tag: TsInterfaceMemberAst = { name: table.tagKey, type: literalType(variant.tag) };
    const members = fieldMembers(context, variant.fields);
    return {
      archivedName: archivedVariantName(table.typeName, variant.name),
      resolverName: resolverVariantName(table.typeName, variant.name),
      archived: [tag, ...members.archived],
      resolver: [tag, ...members.resolver],
    };
  });

  return [
    ...variants.map((v) => interfaceDeclaration(v.archivedName, v.archived, typeParameters)),
    typeAliasDeclaration(
      archivedName(table.typeName),
      unionType(variants.map((v) => generatedType(v.archivedName, table))),
      typeParameters
    ),
    ...variants.map((v) => interfaceDeclaration(v.resolverName, v.resolver, typeParameters)),
    typeAliasDeclaration(
      resolverName(table.typeName),
      unionType(variants.map((v) => generatedType(v.resolverName, table))),
      typeParameters
    ),
  ];
};

export const emitRepresentation = (
  context: EmitterContext,
  table: ValidatedTable
): readonly TsDeclarationAst[] => {
  if (table.shape === "enum") {
    return emitUnionRepresentation(context, table);
  }

  const typeParameters = declareTypeParameters(context, table);
  const members = fieldMembers(context, table.fields);

  return [
    interfaceDeclaration(archivedName(table.typeName), members.archived, typeParameters),
    interfaceDeclaration(resolverName(table.typeName), members.resolver, typeParameters),
  ];
};
