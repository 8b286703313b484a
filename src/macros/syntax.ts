/**
 * Recognizers for macro comment syntax
 *
 * Iteration:  # for VAR in SOURCE [as KIND] [| with P1 P2] [-> FUNC]
 *             ...
 *             # endfor
 * Safety:     # set strict
 *             # trap cleanup [SIGNALS]
 */

import { isIdentifier, leadingWhitespace } from '../script/lexical.js';
import type {
  IterationHeader,
  IterationKind,
  MacroType,
  ParseOutcome,
} from './types.js';

const ITERATION_DETECT = /^for\s+\w+\s+in\s+\S+/i;
const SET_STRICT = /^set\s+strict$/i;
const TRAP_CLEANUP = /^trap\s+cleanup(?:\s+.*)?$/i;
/** Two-word `set X` / `trap X` comments are safety macros with an unknown subtype */
const SAFETY_FAMILY = /^(?:set|trap)\s+\w+$/i;
const END_FOR = /^\s*#\s*endfor\s*$/i;

const HEADER = /^for\s+([A-Za-z_][A-Za-z0-9_]*)\s+in\s+(.*)$/is;
const DIRECT_CALL = /\s*->\s*(\S*)\s*$/;
const WITH_CLAUSE = /^([^|]*?)\s*\|\s*with(?:\s+(.*))?$/i;
const EXPLICIT_KIND = /^(.*?)\s+as\s+(\w+)$/i;

const KIND_KEYWORDS: Record<string, IterationKind> = {
  file: 'file_lines',
  lines: 'file_lines',
  array: 'array',
  list: 'array',
};

/**
 * Comment text of a full-line comment, without # and surrounding whitespace.
 * Shebangs are not comments here.
 */
export function commentContent(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('#') || trimmed.startsWith('#!')) {
    return null;
  }
  return trimmed.slice(1).trim();
}

/**
 * Classify comment text as a macro, or null for an ordinary comment
 */
export function detectMacroType(content: string): MacroType | null {
  if (ITERATION_DETECT.test(content)) {
    return 'iteration';
  }
  if (
    SET_STRICT.test(content) ||
    TRAP_CLEANUP.test(content) ||
    SAFETY_FAMILY.test(content)
  ) {
    return 'safety';
  }
  return null;
}

/**
 * Match a line opening an iteration macro
 */
export function matchIterationOpen(
  line: string
): { indent: string; content: string } | null {
  const content = commentContent(line);
  if (content === null || detectMacroType(content) !== 'iteration') {
    return null;
  }
  return { indent: leadingWhitespace(line), content };
}

/**
 * Check whether a line closes an iteration block
 */
export function isEndForLine(line: string): boolean {
  return END_FOR.test(line);
}

/**
 * Check whether comment text is `set strict`
 */
export function isSetStrict(content: string): boolean {
  return SET_STRICT.test(content);
}

/**
 * Check whether comment text is `trap cleanup [SIGNALS]`
 */
export function isTrapCleanup(content: string): boolean {
  return TRAP_CLEANUP.test(content);
}

/**
 * Parse iteration macro text into its fields
 */
export function parseIterationHeader(
  content: string
): ParseOutcome<IterationHeader> {
  const header = HEADER.exec(content.trim());
  const iteratorVar = header?.[1];
  let rest = header?.[2]?.trim();
  if (!iteratorVar || rest === undefined) {
    return { ok: false, reason: `expected 'for VAR in SOURCE', got '${content}'` };
  }

  let directCall: string | null = null;
  const call = DIRECT_CALL.exec(rest);
  if (call) {
    const name = call[1] ?? '';
    if (!isIdentifier(name)) {
      return { ok: false, reason: `invalid function name after '->': '${name}'` };
    }
    directCall = name;
    rest = rest.slice(0, call.index).trim();
  }

  let additionalParams: string[] = [];
  if (rest.includes('|')) {
    const clause = WITH_CLAUSE.exec(rest);
    const params = clause?.[2]?.trim();
    if (!clause || !params) {
      return { ok: false, reason: `expected '| with PARAMS' in '${content}'` };
    }
    additionalParams = params.split(/\s+/);
    rest = clause[1] ?? '';
  }

  let explicitKind: IterationKind | null = null;
  const kind = EXPLICIT_KIND.exec(rest);
  if (kind) {
    const keyword = (kind[2] ?? '').toLowerCase();
    const mapped = KIND_KEYWORDS[keyword];
    if (!mapped) {
      return { ok: false, reason: `unknown iteration kind 'as ${keyword}'` };
    }
    explicitKind = mapped;
    rest = kind[1] ?? '';
  }

  const source = rest.trim();
  if (!source) {
    return { ok: false, reason: `missing iteration source in '${content}'` };
  }

  return {
    ok: true,
    value: { iteratorVar, source, explicitKind, additionalParams, directCall },
  };
}

/**
 * Variable name referenced by a source that is a single variable:
 * LIST, $LIST or ${LIST}
 */
export function sourceVariable(source: string): string | null {
  const match = /^(?:\$\{([A-Za-z_]\w*)\}|\$([A-Za-z_]\w*)|([A-Za-z_]\w*))$/.exec(
    source
  );
  return match?.[1] ?? match?.[2] ?? match?.[3] ?? null;
}

/**
 * Infer what a source iterates over from its shape
 */
export function inferIterationKind(source: string): IterationKind {
  const variable = sourceVariable(source);
  if (variable) {
    const upper = variable.toUpperCase();
    if (upper.includes('FILE') || upper.includes('INPUT')) {
      return 'file_lines';
    }
  }
  if (source.startsWith('{') && source.endsWith('}') && source.includes('..')) {
    return 'range';
  }
  if (source.endsWith('/')) {
    return 'directory';
  }
  if (/[*?[]/.test(source)) {
    return 'pattern';
  }
  return 'array';
}

/**
 * Render a source for generated code: a bare name becomes ${NAME},
 * anything else is emitted verbatim
 */
export function renderSource(source: string): string {
  return isIdentifier(source) ? `\${${source}}` : source;
}
