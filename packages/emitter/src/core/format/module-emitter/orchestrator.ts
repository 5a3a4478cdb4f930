/**
 * Main module emission logic
 *
 * A generated module holds, for each validated table in source order, its
 * representation, one archive adapter per remote type and, when every
 * field can be rebuilt, one deserializer per remote type.
 */

import type { SourceReferences, ValidatedTable } from "@archive-with/frontend";
import type { TsDeclarationAst } from "../backend-ast/index.js";
import {
  createContext,
  tableContext,
  type EmitterContext,
  type EmitterOptions,
} from "../../../types.js";
import { emitRepresentation } from "../../../units/representation.js";
import { emitArchiveAdapters } from "../../../units/archive.js";
import { emitDeserializers } from "../../../units/deserialize.js";
import { defaultOptions } from "../options.js";
import { generateHeader } from "./header.js";
import { assembleOutput } from "./assembly.js";

export type ArchiveModuleInput = {
  /** Source file path, as shown in the header */
  readonly fileName: string;
  /**
   * Specifier of the source module as seen from the generated one.
   * Defaults to `./<basename>` with a runtime extension.
   */
  readonly sourceModule?: string;
  readonly references: SourceReferences;
  readonly tables: readonly ValidatedTable[];
};

const RUNTIME_EXTENSIONS: Readonly<Record<string, string>> = {
  ".ts": ".js",
  ".mts": ".mjs",
  ".cts": ".cjs",
  ".tsx": ".js",
};

/**
 * `src/models/remote.ts` -> `./remote.js`
 */
export const sourceModuleSpecifier = (fileName: string): string => {
  const baseName = fileName.split(/[\\/]/).pop() ?? fileName;
  const match = /\.[cm]?tsx?$/.exec(baseName);
  if (!match) return `./${baseName}`;
  const stem = baseName.slice(0, match.index);
  const extension = baseName.slice(match.index);
  return `./${stem}${RUNTIME_EXTENSIONS[extension] ?? ".js"}`;
};

/**
 * All declarations for one validated table, in unit order.
 */
export const emitTypeSpec = (
  context: EmitterContext,
  table: ValidatedTable
): readonly TsDeclarationAst[] => {
  const scoped = tableContext(context, table);
  return [
    ...emitRepresentation(scoped, table),
    ...emitArchiveAdapters(scoped, table),
    ...emitDeserializers(scoped, table),
  ];
};

/**
 * Emit the adapter module for one source file
 */
export const emitModule = (
  input: ArchiveModuleInput,
  options: Partial<EmitterOptions> = {}
): string => {
  const finalOptions: EmitterOptions = { ...defaultOptions, ...options };
  const context = createContext(
    finalOptions,
    input.references,
    input.sourceModule ?? sourceModuleSpecifier(input.fileName),
    input.tables
  );

  return assembleOutput(
    {
      header: generateHeader(input.fileName),
      declarations: input.tables.flatMap((table) => emitTypeSpec(context, table)),
    },
    finalOptions
  );
};
