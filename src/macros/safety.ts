/**
 * Safety macro expansion: `# set strict` and `# trap cleanup`
 *
 * Runs over the output of iteration expansion. Strict mode goes right after
 * the shebang; trap handlers replace their target in place. When both kinds
 * sit at the top of the script they keep their relative order. A target
 * that starts a loop generated by the iteration pass takes the whole loop.
 */

import { isBlankLine, isShebang } from '../script/lexical.js';
import { renderStrictMode, renderTrapHandler } from './codegen.js';
import { parseSafetyMacro } from './parser.js';
import { commentContent, detectMacroType } from './syntax.js';
import type { LineRange, MacroTarget } from './types.js';

/**
 * Check whether every line from `from` on is blank
 */
function onlyBlankFrom(lines: readonly string[], from: number): boolean {
  return lines.slice(from).every(isBlankLine);
}

/**
 * Put the strict mode line at `at`, followed by exactly one blank line when
 * anything comes after it
 */
function insertStrictMode(lines: string[], at: number): void {
  let end = at;
  while (end < lines.length && isBlankLine(lines[end] ?? '')) {
    end++;
  }
  const separator = end < lines.length ? [''] : [];
  lines.splice(at, end - at, renderStrictMode(), ...separator);
}

/**
 * Widen a target to the generated block starting on its first line
 */
function spanGeneratedBlock(
  target: MacroTarget,
  lines: readonly string[],
  blocks: readonly LineRange[]
): MacroTarget {
  let end = target.endLine;
  for (const block of blocks) {
    if (block.start === target.startLine && block.end > end) {
      end = block.end;
    }
  }
  if (end === target.endLine) {
    return target;
  }
  return {
    kind: 'line',
    startLine: target.startLine,
    endLine: end,
    content: lines.slice(target.startLine, end + 1).join('\n'),
  };
}

/**
 * Expand safety macros in script lines. `blocks` are the loops the
 * iteration pass generated.
 */
export function applySafetyMacros(
  lines: readonly string[],
  blocks: readonly LineRange[] = []
): string[] {
  const output: string[] = [];
  // End of the shebang and any handlers emitted before other code
  let prelude = isShebang(lines[0]) ? 1 : 0;
  let strictAt: number | null = null;

  let i = 0;
  while (i < lines.length) {
    const line = lines[i] ?? '';
    const content = commentContent(line);
    const macroType = content === null ? null : detectMacroType(content);

    if (content === null || macroType !== 'safety') {
      output.push(line);
      i++;
      continue;
    }

    const macro = parseSafetyMacro(
      { lineNumber: i, macroType, content, rawLine: line },
      lines
    );

    if (macro.safetyType === 'set_strict') {
      strictAt ??= prelude;
      i++;
      continue;
    }

    const target = spanGeneratedBlock(macro.target, lines, blocks);
    const atTop = strictAt === null && onlyBlankFrom(output, prelude);
    output.push(...renderTrapHandler(target, macro.signals));
    if (atTop) {
      prelude = output.length;
    }
    i = target.endLine + 1;
  }

  if (strictAt !== null) {
    insertStrictMode(output, strictAt);
  }
  return output;
}
