/**
 * Shell function boundary detection
 *
 * Recognizes `name() {`, `function name() {` and `function name {`, then
 * follows brace depth line by line. Quoted substrings are stripped before
 * counting and comment lines are skipped, so braces inside strings and
 * comments do not count.
 */

import { isCommentLine, splitLines, stripQuotedStrings } from '../script/lexical.js';

const FUNCTION_START = [
  /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*\(\s*\)\s*\{/,
  /^\s*function\s+([A-Za-z_][A-Za-z0-9_]*)\s*(?:\(\s*\)\s*)?\{/,
];

/**
 * Result of following a function definition to its closing brace
 */
export type FunctionBoundary =
  | { status: 'closed'; name: string; startLine: number; endLine: number }
  | { status: 'unclosed'; name: string; startLine: number };

/**
 * A closed function definition found in a script
 */
export interface FunctionBlock {
  name: string;
  startLine: number;
  endLine: number;
  definition: string;
}

/**
 * Name of the function a line starts defining, or null
 */
export function matchFunctionStart(line: string): string | null {
  for (const pattern of FUNCTION_START) {
    const name = pattern.exec(line)?.[1];
    if (name) return name;
  }
  return null;
}

/**
 * Net brace depth change of a line, ignoring quoted strings
 */
export function countBraces(line: string): number {
  const stripped = stripQuotedStrings(line);
  let depth = 0;
  for (const char of stripped) {
    if (char === '{') depth++;
    else if (char === '}') depth--;
  }
  return depth;
}

/**
 * Follow the function starting at `start` to its closing brace.
 * Returns null when the line does not start a function definition.
 */
export function findFunctionEnd(
  lines: readonly string[],
  start: number
): FunctionBoundary | null {
  const name = matchFunctionStart(lines[start] ?? '');
  if (!name) {
    return null;
  }

  let depth = countBraces(lines[start] ?? '');
  if (depth <= 0) {
    return { status: 'closed', name, startLine: start, endLine: start };
  }

  for (let i = start + 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (isCommentLine(line)) continue;
    depth += countBraces(line);
    if (depth <= 0) {
      return { status: 'closed', name, startLine: start, endLine: i };
    }
  }

  return { status: 'unclosed', name, startLine: start };
}

/**
 * All closed function definitions in a script, in order
 */
export function findFunctions(scriptText: string): FunctionBlock[] {
  const { lines } = splitLines(scriptText);
  const functions: FunctionBlock[] = [];

  for (let i = 0; i < lines.length; i++) {
    const boundary = findFunctionEnd(lines, i);
    if (boundary?.status === 'closed') {
      functions.push({
        name: boundary.name,
        startLine: i,
        endLine: boundary.endLine,
        definition: lines.slice(i, boundary.endLine + 1).join('\n'),
      });
    }
  }

  return functions;
}

/**
 * Check whether a function with this name is defined anywhere in the lines
 */
export function isFunctionDefined(
  lines: readonly string[],
  name: string
): boolean {
  return lines.some((line) => matchFunctionStart(line) === name);
}
