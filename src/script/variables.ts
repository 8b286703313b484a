/**
 * Variable and positional parameter analysis
 */

import { matchIterationOpen, parseIterationHeader, sourceVariable } from '../macros/syntax.js';
import { DEFAULT_SHELL, SPECIAL_PARAMETERS } from '../utils/constants.js';
import {
  findPositionalReferences,
  findVariableReferences,
  hasVarargsReference,
  isBlankLine,
  isCommentLine,
  isShebang,
  matchAssignment,
  matchLoopVariable,
  splitLines,
} from './lexical.js';
import type { PositionalUsage, VariableClassification } from './types.js';

/** Environment snapshot: name -> value */
export type Environment = Readonly<Record<string, string | undefined>>;

const SHELLS: Record<string, string> = {
  bash: '/bin/bash',
  sh: '/bin/sh',
  dash: '/bin/sh',
  zsh: '/bin/zsh',
  ksh: '/bin/ksh',
};

/**
 * Lines that hold shell code rather than comments
 */
function codeLines(scriptText: string): string[] {
  return splitLines(scriptText).lines.filter(
    (line) => !isBlankLine(line) && !isCommentLine(line)
  );
}

/**
 * Iteration macro headers in the script, skipping malformed ones
 */
function iterationHeaders(scriptText: string) {
  return splitLines(scriptText).lines.flatMap((line) => {
    const open = matchIterationOpen(line);
    if (!open) return [];
    const parsed = parseIterationHeader(open.content);
    return parsed.ok ? [parsed.value] : [];
  });
}

/**
 * Names the script assigns, declares or binds as a loop variable
 */
export function parseDefinedVariables(scriptText: string): Set<string> {
  const defined = new Set<string>();

  for (const line of codeLines(scriptText)) {
    const assigned = matchAssignment(line);
    if (assigned) defined.add(assigned);
    const looped = matchLoopVariable(line);
    if (looped) defined.add(looped);
  }

  for (const header of iterationHeaders(scriptText)) {
    defined.add(header.iteratorVar);
  }

  return defined;
}

/**
 * Names the script references. Comments are skipped, except that the source
 * of an iteration macro counts because expansion turns it into a reference.
 */
export function parseVariableUsages(scriptText: string): Set<string> {
  const used = new Set<string>();

  for (const line of codeLines(scriptText)) {
    for (const name of findVariableReferences(line)) {
      if (!SPECIAL_PARAMETERS.has(name)) used.add(name);
    }
  }

  for (const header of iterationHeaders(scriptText)) {
    const name = sourceVariable(header.source);
    if (name) used.add(name);
  }

  return used;
}

/**
 * Partition the variables a script uses into defined, environment-backed
 * and undefined. The environment is read once, at call time.
 */
export function classifyVariables(
  scriptText: string,
  env: Environment = process.env
): VariableClassification {
  const snapshot = { ...env };
  const defined = parseDefinedVariables(scriptText);
  const used = parseVariableUsages(scriptText);

  const environmentBacked = new Map<string, string>();
  const undefinedNames = new Set<string>();

  for (const name of used) {
    if (defined.has(name)) continue;
    const value = snapshot[name];
    if (value !== undefined) {
      environmentBacked.set(name, value);
    } else {
      undefinedNames.add(name);
    }
  }

  return { defined, used, undefined: undefinedNames, environmentBacked };
}

/**
 * Positional parameters ($1, ${2}) and varargs ($@, $*) the script references
 */
export function parsePositionalUsages(scriptText: string): PositionalUsage {
  const indices = new Set<number>();
  let varargs = false;

  for (const line of codeLines(scriptText)) {
    for (const index of findPositionalReferences(line)) {
      indices.add(index);
    }
    varargs ||= hasVarargsReference(line);
  }

  return { indices, varargs };
}

/**
 * Interpreter named by the shebang, e.g. `#!/usr/bin/env zsh` -> /bin/zsh
 */
export function detectShell(scriptText: string): string {
  const first = splitLines(scriptText).lines[0];
  if (!first || !isShebang(first)) {
    return DEFAULT_SHELL;
  }

  const words = first.slice(2).trim().split(/\s+/);
  const program = words[0]?.endsWith('/env') ? words[1] : words[0];
  const name = program?.split('/').pop() ?? '';
  return SHELLS[name] ?? DEFAULT_SHELL;
}
