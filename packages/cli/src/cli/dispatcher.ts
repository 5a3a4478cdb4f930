/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import type { Result } from "@archive-with/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { checkCommand } from "../commands/check.js";
import type { ArchiveWithConfig, CommandError, CommandSummary } from "../types.js";
import {
  EXIT_CONFIG,
  EXIT_DIAGNOSTICS,
  EXIT_NO_SOURCES,
  EXIT_OK,
  EXIT_UNKNOWN_COMMAND,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const COMMANDS = {
  generate: generateCommand,
  check: checkCommand,
} as const;

const isCommand = (command: string): command is keyof typeof COMMANDS =>
  Object.hasOwn(COMMANDS, command);

const exitCodeOf = (result: Result<CommandSummary, CommandError>): number => {
  if (result.ok) return EXIT_OK;
  console.error(`Error: ${result.error.message}`);
  return result.error.kind === "noSources" ? EXIT_NO_SOURCES : EXIT_DIAGNOSTICS;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`archive-with v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  const command = parsed.command;
  if (!isCommand(command)) {
    console.error(`Error: Unknown command '${command}'`);
    console.error("Run 'archive-with help' for usage");
    return EXIT_UNKNOWN_COMMAND;
  }

  // Load config; none found means defaults
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: ArchiveWithConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT_CONFIG;
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing archive-with.json
  const projectRoot = configPath ? dirname(configPath) : cwd;
  const entryFile = parsed.entryFile ? resolve(cwd, parsed.entryFile) : undefined;
  const config = resolveConfig(fileConfig, parsed.options, projectRoot, entryFile);

  if (config.verbose && !config.quiet) {
    console.log(`Config: ${configPath ?? "(defaults)"}`);
  }

  return exitCodeOf(COMMANDS[command](config));
};
