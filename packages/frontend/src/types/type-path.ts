/**
 * Type and function paths
 *
 * Grammar:
 *   path      := segment (("." | "::") segment)* typeArgs? ("[" "]")*
 *   typeArgs  := "<" path ("," path)* ">"
 *   segment   := identifier
 */

import { Result, ok, error } from "./result.js";

export type TypePath = {
  readonly segments: readonly string[];
  readonly typeArguments: readonly TypePath[];
  /** Number of trailing `[]` suffixes */
  readonly arrayDepth: number;
};

/**
 * A path naming a callable; no type arguments, no array suffix.
 */
export type FunctionPath = TypePath & {
  readonly typeArguments: readonly [];
  readonly arrayDepth: 0;
};

const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[A-Za-z0-9_$]/;

type Cursor = {
  readonly text: string;
  index: number;
};

const skipWhitespace = (cursor: Cursor): void => {
  while (cursor.index < cursor.text.length && /\s/.test(cursor.text.charAt(cursor.index))) {
    cursor.index++;
  }
};

const peek = (cursor: Cursor, token: string): boolean => {
  skipWhitespace(cursor);
  return cursor.text.startsWith(token, cursor.index);
};

const consume = (cursor: Cursor, token: string): boolean => {
  if (!peek(cursor, token)) return false;
  cursor.index += token.length;
  return true;
};

const readIdentifier = (cursor: Cursor): string | undefined => {
  skipWhitespace(cursor);
  const start = cursor.index;
  if (!IDENTIFIER_START.test(cursor.text.charAt(start))) return undefined;

  cursor.index++;
  while (
    cursor.index < cursor.text.length &&
    IDENTIFIER_PART.test(cursor.text.charAt(cursor.index))
  ) {
    cursor.index++;
  }
  return cursor.text.slice(start, cursor.index);
};

const describePosition = (cursor: Cursor): string =>
  cursor.index >= cursor.text.length
    ? "end of input"
    : `'${cursor.text.charAt(cursor.index)}' at offset ${cursor.index}`;

const readPath = (cursor: Cursor): Result<TypePath, string> => {
  const segments: string[] = [];

  const first = readIdentifier(cursor);
  if (first === undefined) {
    return error(`expected identifier, found ${describePosition(cursor)}`);
  }
  segments.push(first);

  while (peek(cursor, ".") || peek(cursor, "::")) {
    if (!consume(cursor, "::")) consume(cursor, ".");
    const segment = readIdentifier(cursor);
    if (segment === undefined) {
      return error(
        `expected identifier after separator, found ${describePosition(cursor)}`
      );
    }
    segments.push(segment);
  }

  const typeArguments: TypePath[] = [];
  if (consume(cursor, "<")) {
    do {
      const argument = readPath(cursor);
      if (!argument.ok) return argument;
      typeArguments.push(argument.value);
    } while (consume(cursor, ","));

    if (!consume(cursor, ">")) {
      return error(`expected '>', found ${describePosition(cursor)}`);
    }
  }

  let arrayDepth = 0;
  while (consume(cursor, "[")) {
    if (!consume(cursor, "]")) {
      return error(`expected ']', found ${describePosition(cursor)}`);
    }
    arrayDepth++;
  }

  return ok({ segments, typeArguments, arrayDepth });
};

/**
 * Parse a complete type path; trailing input is an error.
 */
export const parseTypePath = (text: string): Result<TypePath, string> => {
  const cursor: Cursor = { text, index: 0 };
  const path = readPath(cursor);
  if (!path.ok) return path;

  skipWhitespace(cursor);
  if (cursor.index < text.length) {
    return error(`unexpected ${describePosition(cursor)}`);
  }
  return path;
};

const isFunctionPath = (path: TypePath): path is FunctionPath =>
  path.typeArguments.length === 0 && path.arrayDepth === 0;

export const parseFunctionPath = (
  text: string
): Result<FunctionPath, string> => {
  const path = parseTypePath(text);
  if (!path.ok) return path;
  if (!isFunctionPath(path.value)) {
    return error("function paths cannot carry type arguments or '[]'");
  }
  return ok(path.value);
};

/**
 * Render a path in type position: `a.b.C<D, E[]>[]`
 */
export const renderTypePath = (path: TypePath): string => {
  const args =
    path.typeArguments.length > 0
      ? `<${path.typeArguments.map(renderTypePath).join(", ")}>`
      : "";
  return `${path.segments.join(".")}${args}${"[]".repeat(path.arrayDepth)}`;
};

export const pathHead = (path: TypePath): string => path.segments[0] ?? "";

export const pathName = (path: TypePath): string =>
  path.segments[path.segments.length - 1] ?? "";

export const samePath = (left: TypePath, right: TypePath): boolean =>
  renderTypePath(left) === renderTypePath(right);

/**
 * Heads of every path reachable from `path`, type arguments included.
 */
export const collectPathHeads = (path: TypePath): readonly string[] => [
  pathHead(path),
  ...path.typeArguments.flatMap(collectPathHeads),
];
