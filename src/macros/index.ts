/**
 * Comment macro expansion
 */

import { joinLines, splitLines } from '../script/lexical.js';
import { type ExpansionOptions, IterationExpander } from './expander.js';
import {
  findMacroComments,
  findTargetForMacro,
  parseIterationMacro,
  parseSafetyMacro,
} from './parser.js';
import { applySafetyMacros } from './safety.js';
import { isEndForLine } from './syntax.js';
import type { MacroSummary, MacroTarget } from './types.js';

export type { ExpansionOptions, IterationFrame } from './expander.js';
export {
  IterationExpander,
  expandIterationMacros,
  pairIterationBlocks,
} from './expander.js';
export { applySafetyMacros } from './safety.js';
export {
  findMacroComments,
  findTargetForMacro,
  parseIterationMacro,
  parseSafetyMacro,
  resolveIterationKind,
} from './parser.js';
export { findFunctionEnd, findFunctions } from './functions.js';
export type { FunctionBlock, FunctionBoundary } from './functions.js';
export type * from './types.js';

/**
 * Expand every macro in a script. Iteration macros go first, then safety
 * macros over the result. Text without macros comes back unchanged.
 */
export function expandMacros(
  scriptText: string,
  options: ExpansionOptions = {}
): string {
  const { lines, trailingNewline } = splitLines(scriptText);
  if (findMacroComments(scriptText).length === 0 && !lines.some(isEndForLine)) {
    return scriptText;
  }

  const iterated = new IterationExpander(lines, options).run();
  const expanded = applySafetyMacros(iterated.lines, iterated.blocks);
  return joinLines(expanded, trailingNewline);
}

function describeTarget(target: MacroTarget | null): string {
  if (!target) return 'none';
  return target.kind === 'function'
    ? `function ${target.name}`
    : `line ${target.startLine + 1}`;
}

/**
 * Summaries of the macros in a script, for verbose output
 */
export function listMacros(scriptText: string): MacroSummary[] {
  const { lines } = splitLines(scriptText);

  return findMacroComments(scriptText).map((comment) => {
    const line = comment.lineNumber + 1;

    if (comment.macroType === 'safety') {
      const macro = parseSafetyMacro(comment, lines);
      return {
        line,
        type: comment.macroType,
        content: comment.content,
        target:
          macro.safetyType === 'trap_cleanup' ? describeTarget(macro.target) : 'script',
        detail:
          macro.safetyType === 'trap_cleanup'
            ? `trap_cleanup ${macro.signals.join(' ')}`
            : 'set_strict',
      };
    }

    const macro = parseIterationMacro(
      comment,
      findTargetForMacro(lines, comment.lineNumber)
    );
    return {
      line,
      type: comment.macroType,
      content: comment.content,
      target: macro.directCall ? `function ${macro.directCall}` : describeTarget(macro.target),
      detail: `${macro.iterationKind} over ${macro.source}`,
    };
  });
}
