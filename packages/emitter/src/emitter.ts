/**
 * Main Adapter Emitter - Public API
 * Orchestrates adapter module generation from validated tables
 */

import type { EmitterOptions } from "./types.js";
import { emitModule, type ArchiveModuleInput } from "./core/format/module-emitter/index.js";
import { defaultOptions } from "./core/format/options.js";
import { companionModule } from "./core/bindings.js";

/**
 * Emit the adapter module for one source file
 */
export const emitArchiveModule = (
  input: ArchiveModuleInput,
  options: Partial<EmitterOptions> = {}
): string => emitModule(input, options);

/**
 * Path the adapter module of a source file is written to:
 * `src/remote.ts` -> `src/remote.archive.ts`
 */
export const archiveModulePath = (fileName: string, companionInfix: string): string =>
  companionModule(fileName, companionInfix);

/**
 * Batch emit adapter modules, keyed by output path. Inputs without tables
 * produce no module.
 */
export const emitArchiveModules = (
  inputs: readonly ArchiveModuleInput[],
  options: Partial<EmitterOptions> = {}
): Map<string, string> => {
  const infix = options.companionInfix ?? defaultOptions.companionInfix;
  const results = new Map<string, string>();

  for (const input of inputs) {
    if (input.tables.length === 0) continue;
    results.set(archiveModulePath(input.fileName, infix), emitModule(input, options));
  }

  return results;
};
