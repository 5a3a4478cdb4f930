/**
 * Directive Model - raw and parsed directive data for one mirror type
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { FunctionPath, TypePath } from "../types/type-path.js";

/**
 * One tokenized directive as delivered by a front end.
 *
 * `from(A, B)` has `args`; `getter = "x.y"` has `value`; `getter_owned`
 * has neither.
 */
export type RawDirective = {
  readonly key: string;
  readonly args?: readonly string[];
  readonly value?: string;
  readonly location?: SourceLocation;
};

/**
 * `enum` mirrors are discriminated unions: one variant per member, told
 * apart by a string literal tag property.
 */
export type MirrorShape = "named" | "tuple" | "unit" | "enum";

export type RawFieldDecl = {
  /** Field name, or its index for tuple mirrors */
  readonly name: string;
  /** Declared type text of the field in the mirror type */
  readonly type: string;
  readonly directives: readonly RawDirective[];
  readonly location?: SourceLocation;
};

export type RawTypeParameter = {
  readonly name: string;
  readonly constraint?: string;
  readonly default?: string;
};

/**
 * One member of a union mirror. Its fields include the tag property.
 */
export type RawVariantDecl = {
  readonly fields: readonly RawFieldDecl[];
  readonly location?: SourceLocation;
};

export type RawTypeDecl = {
  readonly name: string;
  readonly shape: MirrorShape;
  readonly typeParameters?: readonly RawTypeParameter[];
  readonly directives: readonly RawDirective[];
  /** Empty for `enum` mirrors */
  readonly fields: readonly RawFieldDecl[];
  /** Only for `enum` mirrors */
  readonly variants?: readonly RawVariantDecl[];
  readonly location?: SourceLocation;
};

export type FieldDirectives = {
  readonly name: string;
  readonly mirrorType: TypePath;
  readonly from?: TypePath;
  /** Outermost converter first */
  readonly via?: readonly TypePath[];
  readonly getter?: FunctionPath;
  readonly getterOwned: boolean;
  readonly location?: SourceLocation;
};

export type TypeParameter = {
  readonly name: string;
  readonly constraint?: TypePath;
  readonly default?: TypePath;
};

export type VariantDirectives = {
  /** Value of the tag property: `"circle"` */
  readonly tag: string;
  /** Identifier form of the tag used in generated names: `Circle` */
  readonly name: string;
  readonly fields: readonly FieldDirectives[];
  readonly location?: SourceLocation;
};

export type DirectiveModel = {
  readonly typeName: string;
  readonly shape: MirrorShape;
  readonly typeParameters: readonly TypeParameter[];
  /** May be empty here; emptiness is reported by the validator */
  readonly remoteTypes: readonly TypePath[];
  readonly fields: readonly FieldDirectives[];
  readonly variants: readonly VariantDirectives[];
  /** Tag property of `enum` mirrors */
  readonly tagKey: string;
  readonly location?: SourceLocation;
};

export const DEFAULT_TAG_KEY = "kind";

/** Directive keys accepted at type level */
export const TYPE_DIRECTIVE_KEYS = ["from", "tag"] as const;

/** Directive keys accepted at field level */
export const FIELD_DIRECTIVE_KEYS = [
  "from",
  "via",
  "getter",
  "getter_owned",
] as const;
