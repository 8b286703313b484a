/**
 * ANSI color codes and status output
 *
 * Status lines go to stderr so stdout carries only compiled output and
 * the script's own output.
 */

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
} as const;

export type ColorName = keyof typeof colors;

/**
 * Strip ANSI escape codes from a string
 */
// eslint-disable-next-line no-control-regex -- ANSI escape codes require control characters
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '');
}

/**
 * Apply color to a string
 */
export function colorize(text: string, color: ColorName): string {
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Cut to `len` characters, marking the cut with `...`
 */
export function truncate(str: string, len: number): string {
  if (str.length <= len) {
    return str;
  }
  return str.slice(0, len) + '...';
}

/**
 * Format duration in human-readable form
 * Examples: 450ms, 2.5s, 1m30s, 1h2m3s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const hours = Math.floor(totalSeconds / 3600);
  const mins = Math.floor((totalSeconds % 3600) / 60);
  const secs = Math.round(totalSeconds % 60);
  if (hours > 0) {
    return `${hours}h${mins}m${secs}s`;
  }
  return `${mins}m${secs}s`;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Local time as HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/** Dimmed timestamp and a space */
export function timestampPrefix(): string {
  return `${colors.dim}${formatTimestamp()}${colors.reset} `;
}

/**
 * Print a [SHELLFLAGS] status message with timestamp
 */
export function printStatus(message: string): void {
  console.error(
    `${timestampPrefix()}${colors.magenta}[SHELLFLAGS]${colors.reset} ${message}`
  );
}

/**
 * Print a dimmed [SHELLFLAGS] detail line, for verbose output
 */
export function printDetail(message: string): void {
  printStatus(`${colors.dim}${message}${colors.reset}`);
}

/**
 * Print an error in the CLI's `Error: ...` form
 */
export function printError(message: string): void {
  console.error(`${colorize('Error:', 'red')} ${message}`);
}
