/**
 * archive-with Emitter - TypeScript adapter generator
 */

export * from "./types.js";
export { defaultOptions } from "./core/format/options.js";
export { generateFileHeader } from "./constants.js";
export {
  emitTypeSpec,
  sourceModuleSpecifier,
  type ArchiveModuleInput,
} from "./core/format/module-emitter/index.js";
export { emitArchiveModule, emitArchiveModules, archiveModulePath } from "./emitter.js";
