/**
 * Type definitions for CLI
 */

import type { ConverterRegistry } from "@archive-with/frontend";

/**
 * archive-with configuration file (archive-with.json)
 */
export type ArchiveWithConfig = {
  readonly $schema?: string;
  readonly sourceRoot?: string;
  readonly outputInfix?: string;
  readonly runtimeModule?: string;
  readonly converters?: ConverterRegistry;
  /** Explicit source files; scanning is skipped when present */
  readonly files?: readonly string[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  src?: string;
  outInfix?: string;
  runtime?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing archive-with.json
  readonly sourceRoot: string;
  readonly outputInfix: string;
  readonly runtimeModule: string;
  readonly converters: ConverterRegistry;
  readonly files: readonly string[] | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Failure of a command; the dispatcher maps the kind to an exit code
 */
export type CommandError = {
  readonly kind: "diagnostics" | "noSources";
  readonly message: string;
};

/**
 * Per-file result of the extract, compile and emit pipeline
 */
export type FileReport = {
  /** Relative to the project root */
  readonly filePath: string;
  readonly outputPath: string;
  /** Absent when the file produced no units */
  readonly code?: string;
  /** Mirror declarations found, whether or not they compiled */
  readonly mirrorCount: number;
  readonly typeCount: number;
  readonly errorCount: number;
};

export type CommandSummary = {
  readonly files: readonly FileReport[];
  readonly written: readonly string[];
  /** Stale companions of sources whose mirrors all failed */
  readonly removed: readonly string[];
};
