/**
 * IR Builder - turns a parsed Directive Model into a Field Mapping Table
 *
 * Default inference, applied per field in order:
 * 1. no from, no via  -> identity converter
 * 2. from, no via     -> the field's own mirror type converts it
 * 3. via              -> the via chain, whether or not from is present
 * 4. no getter        -> read the field by name from the remote instance
 *
 * The builder never rejects input; consistency checks are the validator's.
 */

import type {
  DirectiveModel,
  FieldDirectives,
  RawTypeDecl,
  VariantDirectives,
} from "../directives/types.js";
import type {
  Converter,
  FieldAccess,
  FieldMappingTable,
  FieldSpec,
  VariantSpec,
} from "./types.js";

const inferConverter = (field: FieldDirectives): Converter => {
  if (field.via) {
    return { kind: "via", paths: field.via };
  }
  if (field.from) {
    return { kind: "self", path: field.mirrorType };
  }
  return { kind: "identity" };
};

/**
 * `getter_owned` without a getter falls back to field access here and is
 * reported by the validator.
 */
const inferAccess = (field: FieldDirectives): FieldAccess =>
  field.getter
    ? { kind: "getter", path: field.getter, owned: field.getterOwned }
    : { kind: "field" };

const buildFieldSpec = (field: FieldDirectives): FieldSpec => ({
  name: field.name,
  mirrorType: field.mirrorType,
  fromType: field.from,
  via: field.via,
  getter: field.getter,
  getterOwned: field.getterOwned,
  inputType: field.from ?? field.mirrorType,
  converter: inferConverter(field),
  access: inferAccess(field),
  location: field.location,
});

const buildVariantSpec = (variant: VariantDirectives): VariantSpec => ({
  tag: variant.tag,
  name: variant.name,
  fields: variant.fields.map(buildFieldSpec),
  location: variant.location,
});

export const buildFieldMappingTable = (
  decl: RawTypeDecl,
  model: DirectiveModel
): FieldMappingTable => ({
  typeName: model.typeName,
  shape: model.shape,
  typeParameters: model.typeParameters,
  remoteTypes: model.remoteTypes,
  fields: model.fields.map(buildFieldSpec),
  variants: model.variants.map(buildVariantSpec),
  tagKey: model.tagKey,
  location: model.location ?? decl.location,
});
