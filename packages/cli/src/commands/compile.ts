/**
 * Shared source pipeline for generate and check
 *
 * Each source file is extracted, compiled type by type and emitted on its
 * own. Diagnostics are printed as they are found.
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join, relative, resolve } from "node:path";
import {
  compileTypeDecls,
  error,
  extractTypeDecls,
  formatDiagnostic,
  isDiagnosticError,
  ok,
  tableFields,
  type Diagnostic,
  type Result,
  type ValidatedTable,
} from "@archive-with/frontend";
import { archiveModulePath, emitArchiveModule } from "@archive-with/emitter";
import type { CommandError, FileReport, ResolvedConfig } from "../types.js";

const SOURCE_FILE = /\.[cm]?tsx?$/;

const toPosix = (path: string): string => path.split("\\").join("/");

/**
 * Generated companions end in the output infix plus an extension.
 */
const isGenerated = (fileName: string, outputInfix: string): boolean => {
  const match = SOURCE_FILE.exec(fileName);
  return match !== null && fileName.slice(0, match.index).endsWith(outputInfix);
};

/**
 * Recursively scan a directory for TypeScript sources, skipping
 * declaration files, generated companions and node_modules
 */
export const scanForSourceFiles = (dir: string, outputInfix: string): readonly string[] => {
  if (!existsSync(dir)) {
    return [];
  }

  const results: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name !== "node_modules") {
        results.push(...scanForSourceFiles(fullPath, outputInfix));
      }
    } else if (
      SOURCE_FILE.test(entry.name) &&
      !/\.d\.[cm]?ts$/.test(entry.name) &&
      !isGenerated(entry.name, outputInfix)
    ) {
      results.push(fullPath);
    }
  }

  return results;
};

/**
 * Source files to process, relative to the project root
 */
export const collectSourceFiles = (config: ResolvedConfig): readonly string[] => {
  const absolute = config.files
    ? config.files.map((file) => resolve(config.projectRoot, file))
    : scanForSourceFiles(resolve(config.projectRoot, config.sourceRoot), config.outputInfix);

  return absolute.map((file) => toPosix(relative(config.projectRoot, file)));
};

const isFile = (path: string): boolean =>
  statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;

/**
 * Source files to process. Named files have to exist; a scan has to find
 * at least one.
 */
export const resolveSourceFiles = (
  config: ResolvedConfig
): Result<readonly string[], CommandError> => {
  const sources = collectSourceFiles(config);
  if (sources.length === 0) {
    return error({
      kind: "noSources",
      message: `No source files found in ${config.sourceRoot}`,
    });
  }

  const missing = sources.filter((file) => !isFile(resolve(config.projectRoot, file)));
  if (missing.length > 0) {
    return error({
      kind: "noSources",
      message: `Source file not found: ${missing.join(", ")}`,
    });
  }

  return ok(sources);
};

/**
 * Print diagnostics: errors to stderr, the rest to stdout unless quiet
 */
export const reportDiagnostics = (
  diagnostics: readonly Diagnostic[],
  config: ResolvedConfig
): void => {
  for (const diagnostic of diagnostics) {
    if (isDiagnosticError(diagnostic)) {
      console.error(formatDiagnostic(diagnostic));
    } else if (!config.quiet && (diagnostic.severity !== "info" || config.verbose)) {
      console.log(formatDiagnostic(diagnostic));
    }
  }
};

const describeTable = (table: ValidatedTable): string => {
  const adapters = table.remoteTypes.length;
  const deserializers = table.fullyReconstructable ? adapters : 0;
  return `  ${table.typeName}: ${tableFields(table).length} field(s), ${adapters} adapter(s), ${deserializers} deserializer(s)`;
};

/**
 * Extract, compile and emit one source file
 */
export const compileFile = (filePath: string, config: ResolvedConfig): FileReport => {
  const text = readFileSync(resolve(config.projectRoot, filePath), "utf-8");
  const extraction = extractTypeDecls(filePath, text);
  const outcomes = compileTypeDecls(extraction.decls, {
    converters: config.converters,
    references: extraction.references,
  });

  const diagnostics = [
    ...extraction.diagnostics,
    ...outcomes.flatMap((outcome) => outcome.diagnostics),
  ];
  reportDiagnostics(diagnostics, config);

  const tables = outcomes.flatMap((outcome) => (outcome.table ? [outcome.table] : []));
  if (config.verbose && !config.quiet) {
    for (const table of tables) console.log(describeTable(table));
  }

  const report = {
    filePath,
    outputPath: archiveModulePath(filePath, config.outputInfix),
    mirrorCount: extraction.decls.length,
    typeCount: tables.length,
    errorCount: diagnostics.filter(isDiagnosticError).length,
  };

  return tables.length === 0
    ? report
    : {
        ...report,
        code: emitArchiveModule(
          { fileName: filePath, references: extraction.references, tables },
          { runtimeModule: config.runtimeModule, companionInfix: config.outputInfix }
        ),
      };
};
