/**
 * Directive text tokenizer
 *
 * Splits directive text such as
 *
 *   from(Remote, Other<T>) via(AsString) getter = "owner.read" getter_owned
 *
 * into raw directives. Items may be separated by whitespace or commas.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";
import type { RawDirective } from "./types.js";

const OPENERS: Readonly<Record<string, string>> = {
  "(": ")",
  "<": ">",
  "[": "]",
};

const CLOSERS = new Set(Object.values(OPENERS));

type Scanner = {
  readonly text: string;
  index: number;
};

const current = (scanner: Scanner): string => scanner.text.charAt(scanner.index);

const atEnd = (scanner: Scanner): boolean => scanner.index >= scanner.text.length;

const skipSeparators = (scanner: Scanner): void => {
  while (!atEnd(scanner) && /[\s,]/.test(current(scanner))) {
    scanner.index++;
  }
};

const skipWhitespace = (scanner: Scanner): void => {
  while (!atEnd(scanner) && /\s/.test(current(scanner))) {
    scanner.index++;
  }
};

const readKey = (scanner: Scanner): string | undefined => {
  const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(scanner.text.slice(scanner.index));
  if (!match) return undefined;
  scanner.index += match[0].length;
  return match[0];
};

/**
 * Read a parenthesised argument list; the scanner sits on "(".
 */
const readArguments = (scanner: Scanner): Result<readonly string[], string> => {
  const start = scanner.index;
  const stack: string[] = [];
  const args: string[] = [];
  let argStart = scanner.index + 1;

  while (!atEnd(scanner)) {
    const ch = current(scanner);
    const closer = OPENERS[ch];

    if (closer !== undefined) {
      stack.push(closer);
    } else if (CLOSERS.has(ch)) {
      if (stack.pop() !== ch) {
        return error(`unbalanced '${ch}' at offset ${scanner.index}`);
      }
      if (stack.length === 0) {
        // An empty tail is either `()` or a trailing comma
        const last = scanner.text.slice(argStart, scanner.index).trim();
        scanner.index++;
        if (last !== "") {
          args.push(last);
        }
        return ok(args);
      }
    } else if (ch === "," && stack.length === 1) {
      const arg = scanner.text.slice(argStart, scanner.index).trim();
      if (arg === "") {
        return error(`empty argument at offset ${argStart}`);
      }
      args.push(arg);
      argStart = scanner.index + 1;
    }

    scanner.index++;
  }

  return error(`unterminated argument list starting at offset ${start}`);
};

/**
 * Read a double-quoted string; the scanner sits on the opening quote.
 */
const readString = (scanner: Scanner): Result<string, string> => {
  const start = scanner.index;
  let value = "";
  scanner.index++;

  while (!atEnd(scanner)) {
    const ch = current(scanner);
    if (ch === "\\") {
      const next = scanner.text.charAt(scanner.index + 1);
      value += next;
      scanner.index += 2;
      continue;
    }
    if (ch === '"') {
      scanner.index++;
      return ok(value);
    }
    value += ch;
    scanner.index++;
  }

  return error(`unterminated string starting at offset ${start}`);
};

export const tokenizeDirectiveText = (
  text: string,
  location?: SourceLocation
): Result<readonly RawDirective[], string> => {
  const scanner: Scanner = { text, index: 0 };
  const directives: RawDirective[] = [];

  skipSeparators(scanner);
  while (!atEnd(scanner)) {
    const key = readKey(scanner);
    if (key === undefined) {
      return error(
        `expected directive name, found '${current(scanner)}' at offset ${scanner.index}`
      );
    }

    skipWhitespace(scanner);

    if (current(scanner) === "(") {
      const args = readArguments(scanner);
      if (!args.ok) return args;
      directives.push({ key, args: args.value, location });
    } else if (current(scanner) === "=") {
      scanner.index++;
      skipWhitespace(scanner);
      if (current(scanner) !== '"') {
        return error(`expected a quoted value after '${key} ='`);
      }
      const value = readString(scanner);
      if (!value.ok) return value;
      directives.push({ key, value: value.value, location });
    } else {
      directives.push({ key, location });
    }

    skipSeparators(scanner);
  }

  return ok(directives);
};
