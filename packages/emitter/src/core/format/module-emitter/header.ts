/**
 * File header generation
 */

import { generateFileHeader } from "../../../constants.js";

/**
 * Header naming the source file the module was generated from
 */
export const generateHeader = (fileName: string): string => generateFileHeader(fileName);
