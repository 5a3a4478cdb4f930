/**
 * Emitter options and defaults
 */

import { EmitterOptions } from "../../types.js";

/**
 * Default emitter options
 */
export const defaultOptions: EmitterOptions = {
  runtimeModule: "./archive-runtime.js",
  companionInfix: ".archive",
};
