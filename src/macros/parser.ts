/**
 * Macro comment discovery, target resolution and parsing
 */

import { parseSignalList } from '../parsers/signals.js';
import { splitLines } from '../script/lexical.js';
import type { ArgumentKind } from '../script/types.js';
import { ScriptError } from '../types/errors.js';
import { findFunctionEnd } from './functions.js';
import {
  commentContent,
  detectMacroType,
  inferIterationKind,
  isSetStrict,
  isTrapCleanup,
  parseIterationHeader,
  sourceVariable,
} from './syntax.js';
import type {
  IterationKind,
  IterationMacro,
  MacroComment,
  MacroTarget,
  SafetyMacro,
} from './types.js';

/**
 * Find all macro comments in a script, in line order
 */
export function findMacroComments(scriptText: string): MacroComment[] {
  const { lines } = splitLines(scriptText);
  const macros: MacroComment[] = [];

  for (const [i, line] of lines.entries()) {
    const content = commentContent(line);
    if (content === null) continue;
    const macroType = detectMacroType(content);
    if (macroType) {
      macros.push({ lineNumber: i, macroType, content, rawLine: line });
    }
  }

  return macros;
}

/**
 * Resolve what the macro on `macroLine` applies to: the function defined on
 * the next line, or else the next line itself. Null when the macro is the
 * last line.
 */
export function findTargetForMacro(
  lines: readonly string[],
  macroLine: number
): MacroTarget | null {
  const start = macroLine + 1;
  if (start >= lines.length) {
    return null;
  }

  const boundary = findFunctionEnd(lines, start);
  if (boundary?.status === 'unclosed') {
    throw new ScriptError(
      'unclosed-function',
      `function '${boundary.name}' has no closing brace`,
      start + 1
    );
  }
  if (boundary) {
    return {
      kind: 'function',
      name: boundary.name,
      startLine: start,
      endLine: boundary.endLine,
      content: lines.slice(start, boundary.endLine + 1).join('\n'),
    };
  }

  return {
    kind: 'line',
    startLine: start,
    endLine: start,
    content: lines[start] ?? '',
  };
}

/**
 * Iteration kind for a source, honoring an explicit `as` suffix first and a
 * file-typed annotation on the source variable second
 */
export function resolveIterationKind(
  source: string,
  explicitKind: IterationKind | null,
  variableKinds?: ReadonlyMap<string, ArgumentKind>
): IterationKind {
  if (explicitKind) {
    return explicitKind;
  }
  const variable = sourceVariable(source);
  if (variable && variableKinds?.get(variable.toUpperCase()) === 'file') {
    return 'file_lines';
  }
  return inferIterationKind(source);
}

/**
 * Parse an iteration macro comment. The direct-call form carries no target.
 */
export function parseIterationMacro(
  comment: MacroComment,
  target: MacroTarget | null,
  variableKinds?: ReadonlyMap<string, ArgumentKind>
): IterationMacro {
  const parsed = parseIterationHeader(comment.content);
  if (!parsed.ok) {
    throw new ScriptError(
      'iteration-syntax',
      `invalid iteration macro: ${parsed.reason}`,
      comment.lineNumber + 1
    );
  }

  const header = parsed.value;
  if (!header.directCall && !target) {
    throw new ScriptError(
      'missing-target',
      `no target found for macro '${comment.content}'`,
      comment.lineNumber + 1
    );
  }

  return {
    ...header,
    comment,
    iterationKind: resolveIterationKind(
      header.source,
      header.explicitKind,
      variableKinds
    ),
    target: header.directCall ? null : target,
  };
}

/**
 * Parse a safety macro comment, resolving the target of `trap cleanup`
 */
export function parseSafetyMacro(
  comment: MacroComment,
  lines: readonly string[]
): SafetyMacro {
  const line = comment.lineNumber + 1;

  if (isSetStrict(comment.content)) {
    return { safetyType: 'set_strict', comment };
  }

  if (!isTrapCleanup(comment.content)) {
    throw new ScriptError(
      'safety-subtype',
      `Unknown safety macro type '${comment.content}' (expected 'set strict' or 'trap cleanup')`,
      line
    );
  }

  const signalText = comment.content.replace(/^trap\s+cleanup/i, '');
  const signals = parseSignalList(signalText);
  if (!signals.ok) {
    throw new ScriptError('signal', signals.reason, line);
  }

  const target = findTargetForMacro(lines, comment.lineNumber);
  if (!target) {
    throw new ScriptError(
      'missing-target',
      `no target found for macro '${comment.content}'`,
      line
    );
  }

  return {
    safetyType: 'trap_cleanup',
    comment,
    signals: signals.value,
    target,
  };
}
