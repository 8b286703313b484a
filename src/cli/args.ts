/**
 * CLI argument parsing for the tool itself
 *
 * Tool options come before the script path; everything after it belongs
 * to the script's generated parser.
 */

import * as fs from 'fs';

import type {
  ParsedArgs,
  Subcommand,
  ToolConfig,
} from '../types/config.js';
import { EXIT_USAGE } from '../utils/constants.js';

const VALID_SUBCOMMANDS: readonly Subcommand[] = ['run', 'compile', 'export'];

const USAGE_LINE =
  'Usage: shellflags [run|compile|export] [options] <script> [script options]';

function isValidSubcommand(value: string): value is Subcommand {
  return VALID_SUBCOMMANDS.some((subcommand) => subcommand === value);
}

/**
 * Version from the package manifest next to the sources or the build
 */
export function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return 'unknown';
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE_LINE);
  process.exit(EXIT_USAGE);
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  let subcommand: Subcommand | undefined;
  const config: Partial<ToolConfig> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--version' || arg === '-V') {
      console.log(readVersion());
      process.exit(0);
    } else if (arg === '--help' || arg === '-h') {
      printUsage();
      process.exit(0);
    } else if (arg === '--quiet') {
      config.verbosity = 'quiet';
    } else if (arg === '--verbose' || arg === '-v') {
      config.verbosity = 'verbose';
    } else if (arg === '--echo') {
      config.echoMode = true;
    } else if (arg === '--log') {
      config.enableLog = true;
    } else if (arg === '--log-dir') {
      const dir = args[++i];
      if (!dir) fail('--log-dir requires a directory');
      config.logDir = dir;
    } else if (arg.startsWith('--log-dir=')) {
      config.logDir = arg.slice('--log-dir='.length);
    } else if (arg.startsWith('-')) {
      fail(`unknown option '${arg}'`);
    } else if (subcommand === undefined && isValidSubcommand(arg)) {
      subcommand = arg;
    } else {
      return {
        subcommand: subcommand ?? 'run',
        scriptFile: arg,
        scriptArgs: args.slice(i + 1),
        config,
      };
    }
  }

  fail('script file required');
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
shellflags - turns a shell script's variables and comments into a command-line interface

${USAGE_LINE}

Subcommands:
  run (default)        Run the script with the given option values
  compile              Print the script with values injected and macros expanded
  export               Print export statements for the option values

Script options:
  Generated from the script: undefined variables become --options,
  positional parameters become ARG1..ARGn. Use '<script> --help' to list them.

Comment macros:
  # for VAR in SOURCE [as file|array] [| with P...] [-> FUNC]
  # endfor
  # set strict
  # trap cleanup [SIGNALS]

Options:
  --verbose, -v        Show analysis details
  --quiet              Errors only
  --echo               Print each command instead of running it
  --log                Write a log file
  --log-dir <dir>      Log directory (default: logs)
  --version, -V        Print version
  --help, -h           Show this help
`);
}
