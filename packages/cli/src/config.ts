/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  error,
  ok,
  type ConverterRegistry,
  type Result,
} from "@archive-with/frontend";
import { defaultOptions } from "@archive-with/emitter";
import type { ArchiveWithConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "archive-with.json";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const STRING_FIELDS = ["$schema", "sourceRoot", "outputInfix", "runtimeModule"] as const;

const readConverters = (value: unknown): Result<ConverterRegistry | undefined, string> => {
  if (value === undefined) return ok(undefined);
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: 'converters' must be an object`);
  }

  const registry: Record<string, { readonly accepts: readonly string[] }> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (!isRecord(entry) || !isStringArray(entry.accepts)) {
      return error(
        `${CONFIG_FILE_NAME}: converter '${name}' must be { "accepts": string[] }`
      );
    }
    registry[name] = { accepts: entry.accepts };
  }
  return ok(registry);
};

/**
 * Check a parsed config file and keep only known fields
 */
export const parseConfig = (value: unknown): Result<ArchiveWithConfig, string> => {
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: expected an object`);
  }

  for (const key of STRING_FIELDS) {
    const field = value[key];
    if (field !== undefined && typeof field !== "string") {
      return error(`${CONFIG_FILE_NAME}: '${key}' must be a string`);
    }
  }

  const converters = readConverters(value.converters);
  if (!converters.ok) return converters;

  const files = value.files;
  if (files !== undefined && !isStringArray(files)) {
    return error(`${CONFIG_FILE_NAME}: 'files' must be an array of strings`);
  }

  return ok({
    $schema: optionalString(value.$schema),
    sourceRoot: optionalString(value.sourceRoot),
    outputInfix: optionalString(value.outputInfix),
    runtimeModule: optionalString(value.runtimeModule),
    converters: converters.value,
    files,
  });
};

/**
 * Load archive-with.json
 */
export const loadConfig = (configPath: string): Result<ArchiveWithConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  return parseConfig(parsed);
};

/**
 * Find archive-with.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 */
export const resolveConfig = (
  config: ArchiveWithConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd(),
  entryFile?: string
): ResolvedConfig => ({
  projectRoot,
  sourceRoot: cliOptions.src ?? config.sourceRoot ?? "src",
  outputInfix: cliOptions.outInfix ?? config.outputInfix ?? defaultOptions.companionInfix,
  runtimeModule: cliOptions.runtime ?? config.runtimeModule ?? defaultOptions.runtimeModule,
  converters: config.converters ?? {},
  files: entryFile ? [entryFile] : config.files,
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
