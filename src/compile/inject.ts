/**
 * Script compilation: value injection, echo mode and export lines
 */

import { isBlankLine, isCommentLine, isShebang, joinLines, splitLines } from '../script/lexical.js';
import { INJECTION_MARKER } from '../utils/constants.js';
import { shellQuote } from '../utils/formatting.js';

const ASSIGNMENT_LINE = /^\s*[A-Za-z_][A-Za-z0-9_]*=/;

function sortedEntries(values: ReadonlyMap<string, string>): Array<[string, string]> {
  return [...values.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Insert `NAME=value` assignments, sorted by name, after the shebang
 * (or at the top) under a marker comment
 */
export function injectVariableAssignments(
  scriptText: string,
  values: ReadonlyMap<string, string>
): string {
  const block = [
    INJECTION_MARKER,
    ...sortedEntries(values).map(([name, value]) => `${name}=${shellQuote(value)}`),
  ];

  const { lines, trailingNewline } = splitLines(scriptText);
  if (isShebang(lines[0])) {
    return joinLines([...lines.slice(0, 1), ...block, ...lines.slice(1)], trailingNewline);
  }
  return `${block.join('\n')}\n${scriptText}`;
}

/**
 * Replace each command line with an echo of itself. The shebang, the
 * injected assignments, comments and blank lines stay as they are.
 */
export function transformToEchoMode(scriptText: string): string {
  const { lines, trailingNewline } = splitLines(scriptText);
  const result: string[] = [];
  let i = 0;

  if (isShebang(lines[0])) {
    result.push(lines[0] ?? '');
    i = 1;
  }
  if (lines[i]?.startsWith(INJECTION_MARKER)) {
    result.push(lines[i] ?? '');
    i++;
    while (i < lines.length && ASSIGNMENT_LINE.test(lines[i] ?? '')) {
      result.push(lines[i] ?? '');
      i++;
    }
  }

  for (const line of lines.slice(i)) {
    if (isBlankLine(line) || isCommentLine(line)) {
      result.push(line);
    } else {
      const escaped = line.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
      result.push(`echo "${escaped}"`);
    }
  }

  return joinLines(result, trailingNewline);
}

/**
 * `export NAME=value` lines, sorted by name
 */
export function generateExportLines(values: ReadonlyMap<string, string>): string {
  return sortedEntries(values)
    .map(([name, value]) => `export ${name}=${shellQuote(value)}`)
    .join('\n');
}
