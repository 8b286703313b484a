/**
 * Centralized constants for the shellflags codebase
 */

// === Shell Parameters ===
/** Special shell parameters never treated as script variables */
export const SPECIAL_PARAMETERS: ReadonlySet<string> = new Set([
  '@',
  '*',
  '#',
  '?',
  '$',
  '!',
  '0',
]);

/** Default shell when no shebang names one */
export const DEFAULT_SHELL = '/bin/bash';

// === Macro Expansion ===
/** Line emitted in place of a `# set strict` macro */
export const STRICT_MODE_LINE = 'set -eou --pipefail';
/** Signals trapped when `# trap cleanup` names none */
export const DEFAULT_TRAP_SIGNALS: readonly string[] = [
  'EXIT',
  'ERR',
  'INT',
  'TERM',
];
/** Default ceiling on iteration-macro nesting */
export const DEFAULT_MAX_NESTING_DEPTH = 64;
/** Indentation used for generated loop and handler bodies */
export const GENERATED_INDENT = '    ';

// === Compilation ===
/** Marker comment opening the injected assignment block */
export const INJECTION_MARKER = '# shellflags: injected variable definitions';

// === Size Thresholds ===
/** Threshold for displaying size in K (1000 chars) */
export const SIZE_THRESHOLD_K = 1000;
/** Threshold for displaying size in M (1000000 chars) */
export const SIZE_THRESHOLD_M = 1000000;

// === PTY Configuration ===
/** Terminal column width */
export const PTY_COLS = 120;
/** Terminal row count */
export const PTY_ROWS = 40;

// === Exit Codes ===
/** Exit code for usage errors (bad options, missing script) */
export const EXIT_USAGE = 2;
/** Exit code for analysis or expansion failures */
export const EXIT_FAILURE = 1;
