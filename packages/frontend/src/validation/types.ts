/**
 * Validation options and rule signature
 */

import type { Diagnostic } from "../types/diagnostic.js";
import type { FieldMappingTable } from "../ir/types.js";
import type { SourceReferences } from "../source/types.js";

/**
 * Input types a known converter accepts, keyed by the converter's path
 * without type arguments (`AsString`, `codecs.Niche`).
 */
export type ConverterRegistry = Readonly<
  Record<string, { readonly accepts: readonly string[] }>
>;

export type ValidationOptions = {
  readonly converters?: ConverterRegistry;
  /** Name bindings of the declaring file; enables nested mirror checks */
  readonly references?: SourceReferences;
};

export type ValidationRule = (
  table: FieldMappingTable,
  options: ValidationOptions
) => readonly Diagnostic[];
