/**
 * archive-with generate command - write companion adapter modules
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { error, ok, type Result } from "@archive-with/frontend";
import { generateFileHeader } from "@archive-with/emitter";
import type { CommandError, CommandSummary, FileReport, ResolvedConfig } from "../types.js";
import { compileFile, resolveSourceFiles } from "./compile.js";

/**
 * A companion written for this source earlier, recognised by its header
 */
const isStaleCompanion = (file: FileReport, outputPath: string): boolean =>
  file.mirrorCount > 0 &&
  existsSync(outputPath) &&
  readFileSync(outputPath, "utf-8").startsWith(generateFileHeader(file.filePath));

/**
 * Generate adapters for every source file. Files that produced units are
 * written even when another type or file reported errors.
 */
export const generateCommand = (
  config: ResolvedConfig
): Result<CommandSummary, CommandError> => {
  const sources = resolveSourceFiles(config);
  if (!sources.ok) return sources;

  const files = sources.value.map((file) => compileFile(file, config));
  const written: string[] = [];
  const removed: string[] = [];

  for (const file of files) {
    const outputPath = resolve(config.projectRoot, file.outputPath);

    if (file.code === undefined) {
      if (isStaleCompanion(file, outputPath)) {
        rmSync(outputPath);
        removed.push(file.outputPath);
        console.warn(`Removed ${file.outputPath}: no mirror in ${file.filePath} compiled`);
      }
      continue;
    }

    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, file.code, "utf-8");
    written.push(file.outputPath);
    if (!config.quiet) {
      console.log(`Generated ${file.outputPath}`);
    }
  }

  const errorCount = files.reduce((sum, file) => sum + file.errorCount, 0);
  return errorCount > 0
    ? error({
        kind: "diagnostics",
        message: `${errorCount} error(s) reported; ${written.length} file(s) written`,
      })
    : ok({ files, written, removed });
};
