/**
 * Validation - Public API
 */

export { validateTable } from "./orchestrator.js";
export { registryKey } from "./conversions.js";
export type {
  ConverterRegistry,
  ValidationOptions,
  ValidationRule,
} from "./types.js";
