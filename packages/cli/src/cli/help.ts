/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
archive-with - archive adapter generator for remote types v${VERSION}

USAGE:
  archive-with <command> [file] [options]

COMMANDS:
  generate [file]           Generate companion adapter modules
  check [file]              Report diagnostics without writing
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: archive-with.json)

GENERATE/CHECK OPTIONS:
  -s, --src <dir>           Source root directory (default: src)
  --out-infix <infix>       Companion infix (default: .archive)
  --runtime <module>        Runtime module specifier (default: ./archive-runtime.js)

EXIT CODES:
  0  success
  1  errors were reported
  2  unknown command
  3  configuration error
  4  no source files

EXAMPLES:
  archive-with generate
  archive-with generate src/models/remote.ts
  archive-with check --src lib --runtime @app/archive-runtime
`);
};
