/**
 * Lexical recognizers over shell script text
 *
 * These are line-local pattern matchers, not a shell tokenizer: quoting,
 * command substitution and here-docs are treated as opaque text.
 */

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const ASSIGNMENT =
  /^\s*(?:(?:export|local|readonly)\s+|declare(?:\s+-[A-Za-z]+)?\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/;

const LOOP_VARIABLE = /^\s*for\s+([A-Za-z_][A-Za-z0-9_]*)\s+in\b/;

const VARIABLE_REFERENCE =
  /(\\?)\$(?:\{([A-Za-z_][A-Za-z0-9_]*)[^}]*\}|([A-Za-z_][A-Za-z0-9_]*))/g;

const POSITIONAL_REFERENCE = /(\\?)\$(?:\{([1-9][0-9]*)\}|([1-9][0-9]*))/g;

const VARARGS_REFERENCE = /(?:^|[^\\])\$(?:[@*]|\{[@*]\})/;

/**
 * Script text split into lines, remembering whether it ended with a newline
 */
export interface ScriptLines {
  lines: string[];
  trailingNewline: boolean;
}

/**
 * Split script text into lines; a final newline does not produce an empty line
 */
export function splitLines(text: string): ScriptLines {
  const trailingNewline = text.endsWith('\n');
  const lines = text.split('\n');
  if (trailingNewline) {
    lines.pop();
  }
  return { lines, trailingNewline };
}

/**
 * Inverse of splitLines
 */
export function joinLines(lines: string[], trailingNewline: boolean): string {
  const body = lines.join('\n');
  return trailingNewline ? `${body}\n` : body;
}

/**
 * Check whether a string is a plain shell name
 */
export function isIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

/**
 * Check whether a line is a full-line comment (shebang included)
 */
export function isCommentLine(line: string): boolean {
  return line.trimStart().startsWith('#');
}

/**
 * Check whether a line is empty or whitespace
 */
export function isBlankLine(line: string): boolean {
  return line.trim() === '';
}

/**
 * Check whether a line is a shebang
 */
export function isShebang(line: string | undefined): boolean {
  return line?.startsWith('#!') ?? false;
}

/**
 * Name assigned by a line, e.g. `export NAME=value` -> NAME
 */
export function matchAssignment(line: string): string | null {
  return ASSIGNMENT.exec(line)?.[1] ?? null;
}

/**
 * Variable bound by a shell for-loop header, e.g. `for f in *.txt; do` -> f
 */
export function matchLoopVariable(line: string): string | null {
  return LOOP_VARIABLE.exec(line)?.[1] ?? null;
}

/**
 * Names referenced as $NAME or ${NAME...}, in order of appearance.
 * Backslash-escaped dollars are not references.
 */
export function findVariableReferences(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(VARIABLE_REFERENCE)) {
    if (match[1]) continue;
    const name = match[2] ?? match[3];
    if (name) names.push(name);
  }
  return names;
}

/**
 * Positional indices referenced as $N or ${N} (N >= 1)
 */
export function findPositionalReferences(text: string): number[] {
  const indices: number[] = [];
  for (const match of text.matchAll(POSITIONAL_REFERENCE)) {
    if (match[1]) continue;
    const digits = match[2] ?? match[3];
    if (digits) indices.push(Number.parseInt(digits, 10));
  }
  return indices;
}

/**
 * Check whether text references $@ or $*
 */
export function hasVarargsReference(text: string): boolean {
  return VARARGS_REFERENCE.test(text);
}

/**
 * Remove single- and double-quoted substrings from a line.
 * Non-recursive: escaped quotes inside strings are not understood.
 */
export function stripQuotedStrings(line: string): string {
  return line.replace(/'[^']*'/g, '').replace(/"[^"]*"/g, '');
}

/**
 * Leading whitespace of a line
 */
export function leadingWhitespace(line: string): string {
  return /^\s*/.exec(line)?.[0] ?? '';
}
