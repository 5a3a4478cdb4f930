/**
 * Directive Model parser
 *
 * Checks the shape of raw directive lists and parses their paths. Any
 * diagnostic produced here is a syntax diagnostic and halts processing of
 * the enclosing type.
 */

import {
  Diagnostic,
  DiagnosticTarget,
  SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";
import { Result, ok, error, collect } from "../types/result.js";
import {
  FunctionPath,
  TypePath,
  parseFunctionPath,
  parseTypePath,
} from "../types/type-path.js";
import {
  DEFAULT_TAG_KEY,
  DirectiveModel,
  FIELD_DIRECTIVE_KEYS,
  FieldDirectives,
  RawDirective,
  RawFieldDecl,
  RawTypeDecl,
  RawVariantDecl,
  TYPE_DIRECTIVE_KEYS,
  TypeParameter,
  VariantDirectives,
} from "./types.js";

type FieldDirectiveKey = (typeof FIELD_DIRECTIVE_KEYS)[number];
type TypeDirectiveKey = (typeof TYPE_DIRECTIVE_KEYS)[number];

const isFieldDirectiveKey = (key: string): key is FieldDirectiveKey =>
  FIELD_DIRECTIVE_KEYS.some((known) => known === key);

const isTypeDirectiveKey = (key: string): key is TypeDirectiveKey =>
  TYPE_DIRECTIVE_KEYS.some((known) => known === key);

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const STRING_LITERAL_TYPE = /^(?:"([^"\\]*)"|'([^'\\]*)')$/;

const syntaxError = (
  message: string,
  target: DiagnosticTarget,
  hint?: string
): Diagnostic => createDiagnostic("AW1001", "error", message, target, hint);

const duplicateError = (message: string, target: DiagnosticTarget): Diagnostic =>
  createDiagnostic("AW1002", "error", message, target);

/**
 * Converter paths are also written as values, where `T[]` has no spelling.
 */
const hasArrayArgument = (path: TypePath): boolean =>
  path.typeArguments.some(
    (argument) => argument.arrayDepth > 0 || hasArrayArgument(argument)
  );

const locate = (
  ...candidates: readonly (SourceLocation | undefined)[]
): SourceLocation | undefined => candidates.find((c) => c !== undefined);

const parseTypeArgument = (
  text: string,
  directive: string,
  target: DiagnosticTarget
): Result<TypePath, Diagnostic> => {
  const parsed = parseTypePath(text);
  return parsed.ok
    ? parsed
    : error(
        syntaxError(
          `invalid type path '${text}' in '${directive}': ${parsed.error}`,
          target
        )
      );
};

type TypeDirectives = {
  readonly remoteTypes: readonly TypePath[];
  readonly tagKey: string;
};

const parseFromDirective = (
  directive: RawDirective,
  target: DiagnosticTarget,
  remoteTypes: TypePath[],
  diagnostics: Diagnostic[]
): void => {
  if (directive.value !== undefined || !directive.args) {
    diagnostics.push(
      syntaxError("'from' takes a parenthesised list of types", target, "from(Remote)")
    );
    return;
  }

  if (directive.args.length === 0) {
    diagnostics.push(syntaxError("'from' requires at least one type", target));
    return;
  }

  for (const arg of directive.args) {
    const parsed = parseTypeArgument(arg, "from", target);
    if (parsed.ok) {
      remoteTypes.push(parsed.value);
    } else {
      diagnostics.push(parsed.error);
    }
  }
};

const parseTagDirective = (
  decl: RawTypeDecl,
  directive: RawDirective,
  target: DiagnosticTarget
): Result<string, Diagnostic> => {
  if (decl.shape !== "enum") {
    return error(syntaxError("'tag' only applies to union mirrors", target));
  }
  if (directive.args !== undefined || directive.value === undefined) {
    return error(syntaxError("'tag' takes a string value", target, 'tag = "type"'));
  }
  if (!IDENTIFIER.test(directive.value)) {
    return error(
      syntaxError(`tag property '${directive.value}' is not an identifier`, target)
    );
  }
  return ok(directive.value);
};

const parseTypeDirectives = (
  decl: RawTypeDecl,
  diagnostics: Diagnostic[]
): TypeDirectives => {
  const remoteTypes: TypePath[] = [];
  let tagKey: string | undefined;

  for (const directive of decl.directives) {
    const target: DiagnosticTarget = {
      location: locate(directive.location, decl.location),
      typeName: decl.name,
    };

    if (!isTypeDirectiveKey(directive.key)) {
      diagnostics.push(
        syntaxError(
          `unknown type-level directive '${directive.key}'; expected one of ${TYPE_DIRECTIVE_KEYS.join(", ")}`,
          target
        )
      );
      continue;
    }

    switch (directive.key) {
      case "from":
        parseFromDirective(directive, target, remoteTypes, diagnostics);
        break;

      case "tag": {
        if (tagKey !== undefined) {
          diagnostics.push(syntaxError("duplicate 'tag' directive", target));
          break;
        }
        const parsed = parseTagDirective(decl, directive, target);
        if (parsed.ok) {
          tagKey = parsed.value;
        } else {
          diagnostics.push(parsed.error);
        }
        break;
      }

      default: {
        const exhaustive: never = directive.key;
        throw new Error(`ICE: Unhandled type directive '${String(exhaustive)}'`);
      }
    }
  }

  return { remoteTypes, tagKey: tagKey ?? DEFAULT_TAG_KEY };
};

const parseTypeParameters = (
  decl: RawTypeDecl,
  diagnostics: Diagnostic[]
): readonly TypeParameter[] =>
  (decl.typeParameters ?? []).flatMap((parameter): readonly TypeParameter[] => {
    const target: DiagnosticTarget = { location: decl.location, typeName: decl.name };
    const parseOptional = (
      text: string | undefined,
      role: string
    ): TypePath | undefined | false => {
      if (text === undefined) return undefined;
      const parsed = parseTypePath(text);
      if (parsed.ok) return parsed.value;
      diagnostics.push(
        syntaxError(
          `${role} '${text}' of type parameter '${parameter.name}' is not a type path: ${parsed.error}`,
          target
        )
      );
      return false;
    };

    const constraint = parseOptional(parameter.constraint, "constraint");
    const fallback = parseOptional(parameter.default, "default");
    if (constraint === false || fallback === false) return [];

    return [
      {
        name: parameter.name,
        ...(constraint ? { constraint } : {}),
        ...(fallback ? { default: fallback } : {}),
      },
    ];
  });

const singleArgument = (
  directive: RawDirective,
  target: DiagnosticTarget
): Result<string, Diagnostic> => {
  const [only, ...rest] = directive.args ?? [];
  if (directive.value !== undefined || only === undefined || rest.length > 0) {
    return error(
      syntaxError(
        `'${directive.key}' on a field takes exactly one type`,
        target,
        `${directive.key}(Type)`
      )
    );
  }
  return ok(only);
};

const parseConverterPath = (
  text: string,
  target: DiagnosticTarget
): Result<TypePath, Diagnostic> => {
  const path = parseTypeArgument(text, "via", target);
  if (!path.ok) return path;

  if (path.value.arrayDepth > 0) {
    return error(syntaxError(`converter path '${text}' cannot end in '[]'`, target));
  }

  if (hasArrayArgument(path.value)) {
    return error(
      syntaxError(
        `converter path '${text}' cannot take array type arguments`,
        target,
        "wrap the element converter instead, e.g. via(Map<AsString>)"
      )
    );
  }

  return path;
};

type MutableFieldDirectives = {
  from?: TypePath;
  via?: readonly TypePath[];
  getter?: FunctionPath;
  getterOwned: boolean;
};

const applyFieldDirective = (
  key: FieldDirectiveKey,
  directive: RawDirective,
  parsed: MutableFieldDirectives,
  target: DiagnosticTarget
): Diagnostic | undefined => {
  switch (key) {
    case "from": {
      const arg = singleArgument(directive, target);
      if (!arg.ok) return arg.error;

      const path = parseTypeArgument(arg.value, key, target);
      if (!path.ok) return path.error;

      parsed.from = path.value;
      return undefined;
    }

    case "via": {
      const args = directive.args ?? [];
      if (directive.value !== undefined || args.length === 0) {
        return syntaxError(
          "'via' takes one or more converter types",
          target,
          "via(Converter) or via(Outer, Inner)"
        );
      }

      const paths: TypePath[] = [];
      for (const arg of args) {
        const path = parseConverterPath(arg, target);
        if (!path.ok) return path.error;
        paths.push(path.value);
      }

      parsed.via = paths;
      return undefined;
    }

    case "getter": {
      if (directive.args !== undefined || directive.value === undefined) {
        return syntaxError(
          "'getter' takes a string value",
          target,
          'getter = "module.readField"'
        );
      }

      const path = parseFunctionPath(directive.value);
      if (!path.ok) {
        return syntaxError(
          `invalid getter path '${directive.value}': ${path.error}`,
          target
        );
      }

      parsed.getter = path.value;
      return undefined;
    }

    case "getter_owned":
      if (directive.args !== undefined || directive.value !== undefined) {
        return syntaxError("'getter_owned' is a flag and takes no arguments", target);
      }
      parsed.getterOwned = true;
      return undefined;

    default: {
      const exhaustive: never = key;
      throw new Error(`ICE: Unhandled field directive '${String(exhaustive)}'`);
    }
  }
};

/**
 * Variant fields are reported as `tag.field`.
 */
const parseField = (
  decl: RawTypeDecl,
  field: RawFieldDecl,
  fieldLabel: string,
  diagnostics: Diagnostic[]
): FieldDirectives | undefined => {
  const fieldTarget: DiagnosticTarget = {
    location: locate(field.location, decl.location),
    typeName: decl.name,
    fieldName: fieldLabel,
  };

  const mirrorType = parseTypePath(field.type);
  if (!mirrorType.ok) {
    diagnostics.push(
      syntaxError(
        `cannot use declared type '${field.type}' as a type path: ${mirrorType.error}`,
        fieldTarget,
        "declare a named type alias for the field's type"
      )
    );
  }

  const parsed: MutableFieldDirectives = { getterOwned: false };
  const seen = new Set<string>();
  const before = diagnostics.length;

  for (const directive of field.directives) {
    const target: DiagnosticTarget = {
      ...fieldTarget,
      location: locate(directive.location, field.location, decl.location),
    };

    if (!isFieldDirectiveKey(directive.key)) {
      diagnostics.push(
        syntaxError(
          `unknown field directive '${directive.key}'; expected one of ${FIELD_DIRECTIVE_KEYS.join(", ")}`,
          target
        )
      );
      continue;
    }

    if (seen.has(directive.key)) {
      diagnostics.push(
        syntaxError(`duplicate '${directive.key}' directive`, target)
      );
      continue;
    }
    seen.add(directive.key);

    const problem = applyFieldDirective(directive.key, directive, parsed, target);
    if (problem) {
      diagnostics.push(problem);
    }
  }

  if (!mirrorType.ok || diagnostics.length > before) {
    return undefined;
  }

  return {
    name: field.name,
    mirrorType: mirrorType.value,
    from: parsed.from,
    via: parsed.via,
    getter: parsed.getter,
    getterOwned: parsed.getterOwned,
    location: field.location,
  };
};

const parseFields = (
  decl: RawTypeDecl,
  fields: readonly RawFieldDecl[],
  labelPrefix: string,
  diagnostics: Diagnostic[]
): readonly FieldDirectives[] => {
  const parsedFields: FieldDirectives[] = [];
  const names = new Set<string>();

  for (const field of fields) {
    const label = `${labelPrefix}${field.name}`;
    if (names.has(field.name)) {
      diagnostics.push(
        duplicateError(`duplicate field '${field.name}'`, {
          location: locate(field.location, decl.location),
          typeName: decl.name,
          fieldName: label,
        })
      );
      continue;
    }
    names.add(field.name);

    const parsed = parseField(decl, field, label, diagnostics);
    if (parsed) {
      parsedFields.push(parsed);
    }
  }

  return parsedFields;
};

/**
 * `circle` -> `Circle`, `two-words` -> `TwoWords`
 */
const variantName = (tag: string): string => {
  const name = tag
    .split(/[^A-Za-z0-9_$]+/)
    .filter((part) => part.length > 0)
    .map((part) => `${part.charAt(0).toUpperCase()}${part.slice(1)}`)
    .join("");
  return /^[0-9]/.test(name) ? `_${name}` : name;
};

const parseVariant = (
  decl: RawTypeDecl,
  variant: RawVariantDecl,
  index: number,
  tagKey: string
): Result<VariantDirectives, readonly Diagnostic[]> => {
  const target: DiagnosticTarget = {
    location: locate(variant.location, decl.location),
    typeName: decl.name,
  };

  const tagField = variant.fields.find((field) => field.name === tagKey);
  if (!tagField) {
    return error([
      syntaxError(
        `variant at position ${index} has no '${tagKey}' property`,
        target,
        `add ${tagKey}: "name" to every member of the union`
      ),
    ]);
  }

  const literal = STRING_LITERAL_TYPE.exec(tagField.type);
  const tag = literal ? (literal[1] ?? literal[2]) : undefined;
  if (tag === undefined) {
    return error([
      syntaxError(
        `tag property '${tagKey}' of variant at position ${index} must be a string literal type, found '${tagField.type}'`,
        target
      ),
    ]);
  }

  const name = variantName(tag);
  if (name.length === 0) {
    return error([syntaxError(`variant tag '${tag}' has no identifier characters`, target)]);
  }

  const diagnostics: Diagnostic[] = [];
  if (tagField.directives.length > 0) {
    diagnostics.push(
      syntaxError(`the tag property of variant '${tag}' cannot carry directives`, target)
    );
  }

  const fields = parseFields(
    decl,
    variant.fields.filter((field) => field !== tagField),
    `${tag}.`,
    diagnostics
  );

  return diagnostics.length > 0
    ? error(diagnostics)
    : ok({ tag, name, fields, location: variant.location });
};

const parseVariants = (
  decl: RawTypeDecl,
  tagKey: string,
  diagnostics: Diagnostic[]
): readonly VariantDirectives[] => {
  const parsed = collect(
    (decl.variants ?? []).map((variant, index) => parseVariant(decl, variant, index, tagKey))
  );
  if (!parsed.ok) {
    diagnostics.push(...parsed.error);
    return [];
  }

  const byTag = new Set<string>();
  const byName = new Map<string, string>();
  const target: DiagnosticTarget = { location: decl.location, typeName: decl.name };

  for (const variant of parsed.value) {
    if (byTag.has(variant.tag)) {
      diagnostics.push(duplicateError(`duplicate variant '${variant.tag}'`, target));
      continue;
    }
    byTag.add(variant.tag);

    const previous = byName.get(variant.name);
    if (previous !== undefined) {
      diagnostics.push(
        duplicateError(
          `variants '${previous}' and '${variant.tag}' both produce '${variant.name}'`,
          target
        )
      );
      continue;
    }
    byName.set(variant.name, variant.tag);
  }

  return parsed.value;
};

const checkShape = (decl: RawTypeDecl, diagnostics: Diagnostic[]): void => {
  const target: DiagnosticTarget = {
    location: decl.location,
    typeName: decl.name,
  };

  if (decl.shape === "unit" && decl.fields.length > 0) {
    diagnostics.push(syntaxError("a unit mirror cannot declare fields", target));
  }

  if (decl.shape === "enum" && decl.fields.length > 0) {
    diagnostics.push(syntaxError("a union mirror declares fields on its variants", target));
  }

  if (decl.shape === "enum" && (decl.variants ?? []).length === 0) {
    diagnostics.push(syntaxError("a union mirror needs at least one variant", target));
  }

  if (decl.shape !== "enum" && (decl.variants ?? []).length > 0) {
    diagnostics.push(syntaxError("only union mirrors have variants", target));
  }

  if (decl.shape === "tuple") {
    decl.fields.forEach((field, index) => {
      if (field.name !== String(index)) {
        diagnostics.push(
          syntaxError(
            `tuple field at position ${index} must be named '${index}', found '${field.name}'`,
            { ...target, fieldName: field.name }
          )
        );
      }
    });
  }
};

/**
 * Parse the directives of one mirror type declaration.
 */
export const parseDirectiveModel = (
  decl: RawTypeDecl
): Result<DirectiveModel, readonly Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];

  checkShape(decl, diagnostics);
  const typeParameters = parseTypeParameters(decl, diagnostics);
  const { remoteTypes, tagKey } = parseTypeDirectives(decl, diagnostics);
  const fields = parseFields(decl, decl.fields, "", diagnostics);
  const variants = decl.shape === "enum" ? parseVariants(decl, tagKey, diagnostics) : [];

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok({
    typeName: decl.name,
    shape: decl.shape,
    typeParameters,
    remoteTypes,
    fields,
    variants,
    tagKey,
    location: decl.location,
  });
};
