/**
 * Shell code generation for expanded macros
 */

import { leadingWhitespace } from '../script/lexical.js';
import { GENERATED_INDENT, STRICT_MODE_LINE } from '../utils/constants.js';
import { renderSource } from './syntax.js';
import type { IterationKind, MacroTarget } from './types.js';

/**
 * Opening line of a loop over `source`
 */
export function loopHeader(
  indent: string,
  kind: IterationKind,
  variable: string,
  source: string
): string {
  if (kind === 'file_lines') {
    return `${indent}while IFS= read -r ${variable}; do`;
  }
  return `${indent}for ${variable} in ${renderSource(source)}; do`;
}

/**
 * Closing line of a loop over `source`
 */
export function loopFooter(
  indent: string,
  kind: IterationKind,
  source: string
): string {
  if (kind === 'file_lines') {
    return `${indent}done < ${renderSource(source)}`;
  }
  return `${indent}done`;
}

/**
 * A complete loop as one text block
 */
export function renderLoop(
  indent: string,
  kind: IterationKind,
  variable: string,
  source: string,
  body: readonly string[]
): string {
  return [
    loopHeader(indent, kind, variable, source),
    ...body,
    loopFooter(indent, kind, source),
  ].join('\n');
}

/**
 * Call of `func` with the iterator value and any extra parameters, quoted
 */
export function functionCall(
  indent: string,
  func: string,
  variable: string,
  params: readonly string[]
): string {
  const args = [`"$${variable}"`, ...params.map((param) => `"${param}"`)];
  return `${indent}${func} ${args.join(' ')}`;
}

/**
 * Line emitted for `# set strict`
 */
export function renderStrictMode(): string {
  return STRICT_MODE_LINE;
}

/**
 * Name of the handler generated for a `trap cleanup` target
 */
export function cleanupHandlerName(target: MacroTarget): string {
  return target.kind === 'function'
    ? `_cleanup_${target.name}`
    : `_cleanup_line_${target.startLine + 1}`;
}

/**
 * Body lines a cleanup handler runs: the target lines, or the target
 * function's body
 */
function cleanupBody(target: MacroTarget): string[] {
  if (target.kind === 'line') {
    const lines = target.content.split('\n');
    const base = leadingWhitespace(lines[0] ?? '');
    return lines
      .map((line) => (line.startsWith(base) ? line.slice(base.length) : line.trimStart()))
      .map((line) => line.trimEnd())
      .filter((line) => line !== '')
      .map((line) => `${GENERATED_INDENT}${line}`);
  }

  const lines = target.content.split('\n');
  if (lines.length === 1) {
    const inline = target.content.slice(
      target.content.indexOf('{') + 1,
      target.content.lastIndexOf('}')
    );
    const command = inline.trim().replace(/;$/, '').trim();
    return command ? [`${GENERATED_INDENT}${command}`] : [];
  }
  return lines.slice(1, -1);
}

/**
 * Handler function and trap statement replacing a `trap cleanup` target
 */
export function renderTrapHandler(
  target: MacroTarget,
  signals: readonly string[]
): string[] {
  const handler = cleanupHandlerName(target);
  return [
    `${handler}() {`,
    `${GENERATED_INDENT}local exit_code=$?`,
    ...cleanupBody(target),
    `${GENERATED_INDENT}exit $exit_code`,
    '}',
    `trap ${handler} ${signals.join(' ')}`,
  ];
}
