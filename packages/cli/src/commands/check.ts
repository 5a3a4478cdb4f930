/**
 * archive-with check command - run the pipeline without writing
 */

import { error, ok, type Result } from "@archive-with/frontend";
import type { CommandError, CommandSummary, ResolvedConfig } from "../types.js";
import { compileFile, resolveSourceFiles } from "./compile.js";

export const checkCommand = (
  config: ResolvedConfig
): Result<CommandSummary, CommandError> => {
  const sources = resolveSourceFiles(config);
  if (!sources.ok) return sources;

  const files = sources.value.map((file) => compileFile(file, config));
  const errorCount = files.reduce((sum, file) => sum + file.errorCount, 0);
  const typeCount = files.reduce((sum, file) => sum + file.typeCount, 0);

  if (!config.quiet) {
    console.log(`Checked ${files.length} file(s), ${typeCount} mirror type(s)`);
  }

  return errorCount > 0
    ? error({ kind: "diagnostics", message: `${errorCount} error(s) reported` })
    : ok({ files, written: [], removed: [] });
};
