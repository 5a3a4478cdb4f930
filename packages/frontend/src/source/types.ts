/**
 * Source front end types
 */

import type { Diagnostic } from "../types/diagnostic.js";
import type { RawTypeDecl } from "../directives/types.js";

/**
 * How a name used by a mirror declaration is bound in its source file.
 */
export type SourceReference =
  | {
      readonly kind: "named";
      readonly name: string;
      readonly importedName: string;
      readonly module: string;
    }
  | { readonly kind: "default"; readonly name: string; readonly module: string }
  | { readonly kind: "namespace"; readonly name: string; readonly module: string }
  | { readonly kind: "local"; readonly name: string };

export type SourceReferences = ReadonlyMap<string, SourceReference>;

export type SourceExtraction = {
  readonly fileName: string;
  /** Mirror declarations in source order */
  readonly decls: readonly RawTypeDecl[];
  readonly references: SourceReferences;
  readonly diagnostics: readonly Diagnostic[];
};
