/**
 * Final output assembly
 *
 * Builds a TsModuleAst from the emitted declarations, derives its imports
 * from the names those declarations reference, and prints it.
 */

import { collectBoundNames, printModule } from "../backend-ast/index.js";
import type { TsDeclarationAst, TsModuleAst } from "../backend-ast/index.js";
import type { EmitterOptions } from "../../../types.js";
import { buildImports } from "./imports.js";

export type AssemblyParts = {
  readonly header: string;
  readonly declarations: readonly TsDeclarationAst[];
};

export const assembleModule = (parts: AssemblyParts, options: EmitterOptions): TsModuleAst => ({
  kind: "module",
  headerText: parts.header || undefined,
  imports: buildImports(collectBoundNames(parts.declarations), options),
  declarations: parts.declarations,
});

/**
 * Build the module AST and print it to TypeScript text
 */
export const assembleOutput = (parts: AssemblyParts, options: EmitterOptions): string =>
  printModule(assembleModule(parts, options));
