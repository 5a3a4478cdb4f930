/**
 * Source name binding
 *
 * Paths written in directives are resolved against the source file's
 * imports and declarations. A name the source file does not bind is taken
 * to be ambient and is never imported.
 */

import { pathHead, pathName, TypePath, ValidatedTable } from "@archive-with/frontend";
import {
  arrayType,
  globalBinding,
  invocation,
  localBinding,
  reference,
  typeParameter,
  typeReference,
  TsBinding,
  TsExpressionAst,
  TsTypeAst,
  TsTypeParameterAst,
} from "./format/backend-ast/index.js";
import type { EmitterContext } from "../types.js";

export const bindSourceName = (context: EmitterContext, name: string): TsBinding => {
  if (context.typeParameters.has(name)) return globalBinding;

  const ref = context.references.get(name);
  if (!ref) return globalBinding;

  switch (ref.kind) {
    case "local":
      return {
        kind: "source",
        importKind: "named",
        importedName: ref.name,
        module: context.sourceModule,
      };
    case "named":
      return {
        kind: "source",
        importKind: "named",
        importedName: ref.importedName,
        module: ref.module,
      };
    case "default":
    case "namespace":
      return {
        kind: "source",
        importKind: ref.kind,
        importedName: ref.name,
        module: ref.module,
      };
  }
};

/**
 * A path in type position: `a.B<C>[]`
 */
export const typeFromPath = (context: EmitterContext, path: TypePath): TsTypeAst => {
  let type: TsTypeAst = typeReference(
    path.segments.join("."),
    bindSourceName(context, pathHead(path)),
    path.typeArguments.map((arg) => typeFromPath(context, arg))
  );
  for (let depth = 0; depth < path.arrayDepth; depth++) {
    type = arrayType(type);
  }
  return type;
};

/**
 * Type parameter declarations of a generic mirror, for every generated
 * declaration derived from it.
 */
export const declareTypeParameters = (
  context: EmitterContext,
  table: ValidatedTable
): readonly TsTypeParameterAst[] =>
  table.typeParameters.map((parameter) =>
    typeParameter(
      parameter.name,
      parameter.constraint && typeFromPath(context, parameter.constraint),
      parameter.default && typeFromPath(context, parameter.default)
    )
  );

/**
 * A generated name applied to the mirror's own type parameters:
 * `ArchivedBox<T>`
 */
export const generatedType = (name: string, table: ValidatedTable): TsTypeAst =>
  typeReference(
    name,
    localBinding,
    table.typeParameters.map((parameter) => typeReference(parameter.name, globalBinding))
  );

/**
 * A converter path in value position; type arguments become call
 * arguments: `Map<AsString>` -> `Map(AsString)`
 */
export const valueFromPath = (context: EmitterContext, path: TypePath): TsExpressionAst => {
  const callee = reference(path.segments.join("."), bindSourceName(context, pathHead(path)));
  return path.typeArguments.length > 0
    ? invocation(
        callee,
        path.typeArguments.map((arg) => valueFromPath(context, arg))
      )
    : callee;
};

/**
 * `./inner.js` -> `./inner.archive.js`; specifiers without an extension
 * get the infix appended.
 */
export const companionModule = (specifier: string, infix: string): string => {
  const extension = /\.[cm]?[jt]s$/.exec(specifier);
  return extension
    ? `${specifier.slice(0, extension.index)}${infix}${specifier.slice(extension.index)}`
    : `${specifier}${infix}`;
};

/**
 * Where a nested mirror's generated names live, and the mirror name they
 * are derived from. A generic mirror's adapters are factories.
 */
export type NestedMirror = {
  readonly baseName: string;
  readonly binding: TsBinding;
  readonly generic: boolean;
};

export const resolveNestedMirror = (
  context: EmitterContext,
  mirrorType: TypePath
): NestedMirror => {
  const ref = context.references.get(pathHead(mirrorType));
  if (ref?.kind === "named") {
    return {
      baseName: ref.importedName,
      binding: {
        kind: "companion",
        module: companionModule(ref.module, context.options.companionInfix),
      },
      generic: mirrorType.typeArguments.length > 0,
    };
  }

  const baseName = pathName(mirrorType);
  const local = context.localMirrors.get(baseName);
  return {
    baseName,
    binding: localBinding,
    generic: mirrorType.typeArguments.length > 0 || (local?.typeParameters.length ?? 0) > 0,
  };
};
