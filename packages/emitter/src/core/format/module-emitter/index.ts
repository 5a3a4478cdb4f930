/**
 * Module emission - Public API
 */

export {
  emitModule,
  emitTypeSpec,
  sourceModuleSpecifier,
  type ArchiveModuleInput,
} from "./orchestrator.js";
export { generateHeader } from "./header.js";
export { buildImports } from "./imports.js";
export { assembleModule, assembleOutput, type AssemblyParts } from "./assembly.js";
