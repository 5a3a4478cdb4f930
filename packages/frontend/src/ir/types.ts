/**
 * Field Mapping Table IR
 *
 * Built once per mirror type by the IR builder, finalized by the
 * validator, then consumed read-only by the emitters.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { FunctionPath, TypePath } from "../types/type-path.js";
import type { MirrorShape, TypeParameter } from "../directives/types.js";

/**
 * How a field's value is converted into its archived representation.
 *
 * - identity: the value's own archived form
 * - self: the field's mirror type converts the remote field type
 * - via: explicit converters, outermost first; the last one receives the
 *   remote value
 */
export type Converter =
  | { readonly kind: "identity" }
  | { readonly kind: "self"; readonly path: TypePath }
  | { readonly kind: "via"; readonly paths: readonly TypePath[] };

/**
 * How a field's value is read out of a remote instance.
 */
export type FieldAccess =
  | { readonly kind: "field" }
  | {
      readonly kind: "getter";
      readonly path: FunctionPath;
      /** Consumes the remote instance; a clone is passed */
      readonly owned: boolean;
    };

export type FieldSpec = {
  readonly name: string;
  readonly mirrorType: TypePath;
  readonly fromType?: TypePath;
  readonly via?: readonly TypePath[];
  readonly getter?: FunctionPath;
  readonly getterOwned: boolean;
  /** Type of the field as it exists in the remote type */
  readonly inputType: TypePath;
  readonly converter: Converter;
  readonly access: FieldAccess;
  readonly location?: SourceLocation;
};

export type VariantSpec<F extends FieldSpec = FieldSpec> = {
  readonly tag: string;
  readonly name: string;
  /** Declaration order, tag property excluded */
  readonly fields: readonly F[];
  readonly location?: SourceLocation;
};

export type FieldMappingTable = {
  readonly typeName: string;
  readonly shape: MirrorShape;
  readonly typeParameters: readonly TypeParameter[];
  readonly remoteTypes: readonly TypePath[];
  /** Declaration order; empty for `enum` mirrors */
  readonly fields: readonly FieldSpec[];
  /** Declaration order; only `enum` mirrors have variants */
  readonly variants: readonly VariantSpec[];
  readonly tagKey: string;
  readonly location?: SourceLocation;
};

export type ValidatedFieldSpec = FieldSpec & {
  /** True iff no getter is used for this field */
  readonly reconstructable: boolean;
};

export type ValidatedVariantSpec = VariantSpec<ValidatedFieldSpec>;

export type ValidatedTable = Omit<FieldMappingTable, "fields" | "variants"> & {
  readonly fields: readonly ValidatedFieldSpec[];
  readonly variants: readonly ValidatedVariantSpec[];
  readonly fullyReconstructable: boolean;
};

/**
 * A field together with the name diagnostics use for it: `radius` or,
 * inside a variant, `circle.radius`.
 */
export type LabelledField<F extends FieldSpec = FieldSpec> = {
  readonly label: string;
  readonly field: F;
};

/**
 * Every field of a table, variant fields included, in declaration order.
 */
export const tableFields = <F extends FieldSpec>(table: {
  readonly fields: readonly F[];
  readonly variants: readonly VariantSpec<F>[];
}): readonly LabelledField<F>[] => [
  ...table.fields.map((field) => ({ label: field.name, field })),
  ...table.variants.flatMap((variant) =>
    variant.fields.map((field) => ({ label: `${variant.tag}.${field.name}`, field }))
  ),
];
