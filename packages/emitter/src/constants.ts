/**
 * Shared constants for the archive-with emitter
 */

/**
 * Generate the standard header for emitted files. It carries no
 * timestamp, so regenerating unchanged input yields identical output.
 */
export const generateFileHeader = (filePath: string): string =>
  [
    `// Generated from: ${filePath}`,
    "// WARNING: Do not modify this file manually",
  ].join("\n");
