/**
 * Emitter types
 */

import {
  collectPathHeads,
  tableFields,
  type SourceReferences,
  type TypePath,
  type ValidatedFieldSpec,
  type ValidatedTable,
} from "@archive-with/frontend";

/**
 * Options for adapter module generation
 */
export type EmitterOptions = {
  /** Module specifier the runtime contract is imported from */
  readonly runtimeModule: string;
  /**
   * Inserted before the extension of a mirror's module specifier to find
   * its generated companion: `./inner.js` -> `./inner.archive.js`
   */
  readonly companionInfix: string;
};

/**
 * Per-module emission context
 */
export type EmitterContext = {
  readonly options: EmitterOptions;
  /** Name bindings of the source file */
  readonly references: SourceReferences;
  /** Specifier of the source module as seen from the generated module */
  readonly sourceModule: string;
  /**
   * Names the generated module may bind from the source file or find in
   * scope; runtime imports are renamed around them.
   */
  readonly reservedNames: ReadonlySet<string>;
  /** Mirrors declared in the source file, by name */
  readonly localMirrors: ReadonlyMap<string, ValidatedTable>;
  /** Type parameters of the mirror being emitted */
  readonly typeParameters: ReadonlySet<string>;
};

const fieldPaths = (field: ValidatedFieldSpec): readonly TypePath[] => {
  const converter =
    field.converter.kind === "via"
      ? field.converter.paths
      : field.converter.kind === "self"
        ? [field.converter.path]
        : [];
  const getter = field.access.kind === "getter" ? [field.access.path] : [];
  return [field.mirrorType, field.inputType, ...converter, ...getter];
};

const tablePaths = (table: ValidatedTable): readonly TypePath[] => [
  ...table.remoteTypes,
  ...table.typeParameters.flatMap((parameter) => [
    ...(parameter.constraint ? [parameter.constraint] : []),
    ...(parameter.default ? [parameter.default] : []),
  ]),
  ...tableFields(table).flatMap(({ field }) => fieldPaths(field)),
];

const reservedNamesOf = (
  references: SourceReferences,
  tables: readonly ValidatedTable[]
): ReadonlySet<string> =>
  new Set([
    ...references.keys(),
    ...tables.flatMap((table) => table.typeParameters.map((parameter) => parameter.name)),
    ...tables.flatMap((table) => tablePaths(table).flatMap(collectPathHeads)),
  ]);

export const createContext = (
  options: EmitterOptions,
  references: SourceReferences,
  sourceModule: string,
  tables: readonly ValidatedTable[] = []
): EmitterContext => ({
  options,
  references,
  sourceModule,
  reservedNames: reservedNamesOf(references, tables),
  localMirrors: new Map(tables.map((table) => [table.typeName, table])),
  typeParameters: new Set(),
});

/**
 * The context for emitting one table: its type parameters shadow every
 * other binding.
 */
export const tableContext = (context: EmitterContext, table: ValidatedTable): EmitterContext => ({
  ...context,
  typeParameters: new Set(table.typeParameters.map((parameter) => parameter.name)),
});
