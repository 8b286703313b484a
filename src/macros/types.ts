/**
 * Types for comment macros and their targets
 */

export type MacroType = 'iteration' | 'safety';

/**
 * A full-line comment recognized as a macro
 */
export interface MacroComment {
  /** 0-based */
  lineNumber: number;
  macroType: MacroType;
  /** Comment text without the leading # and surrounding whitespace */
  content: string;
  rawLine: string;
}

/**
 * What a macro applies to: the next function definition or the next line.
 * Line numbers are 0-based and inclusive.
 */
export type MacroTarget =
  | {
      kind: 'function';
      name: string;
      startLine: number;
      endLine: number;
      content: string;
    }
  | {
      kind: 'line';
      startLine: number;
      endLine: number;
      content: string;
    };

export type IterationKind =
  | 'array'
  | 'file_lines'
  | 'pattern'
  | 'range'
  | 'directory';

/**
 * Fields of an iteration macro's comment text:
 * `for VAR in SOURCE [as KIND] [| with P1 P2] [-> FUNC]`
 */
export interface IterationHeader {
  iteratorVar: string;
  source: string;
  /** Set by an `as file` / `as array` suffix */
  explicitKind: IterationKind | null;
  additionalParams: string[];
  /** Set by the `-> FUNC` direct-call form */
  directCall: string | null;
}

export interface IterationMacro extends IterationHeader {
  comment: MacroComment;
  iterationKind: IterationKind;
  /** Absent for the direct-call form, which needs no target */
  target: MacroTarget | null;
}

export type SafetyType = 'set_strict' | 'trap_cleanup';

export type SafetyMacro =
  | {
      safetyType: 'set_strict';
      comment: MacroComment;
    }
  | {
      safetyType: 'trap_cleanup';
      comment: MacroComment;
      signals: string[];
      target: MacroTarget;
    };

/**
 * Summary of a detected macro, for verbose output
 */
export interface MacroSummary {
  /** 1-based */
  line: number;
  type: MacroType;
  content: string;
  target: string;
  detail: string;
}

/**
 * Outcome of parsing text that may be malformed
 */
export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

/**
 * Inclusive 0-based span of lines
 */
export interface LineRange {
  start: number;
  end: number;
}

/**
 * Lines produced by the iteration pass, with the span of every loop among
 * them (nested loops included) relative to the first line
 */
export interface ExpandedLines {
  lines: string[];
  blocks: LineRange[];
}
