/**
 * Structured errors raised by script analysis and macro expansion
 */

/**
 * Rule violated by a script, used to tell failures apart without
 * matching on message text
 */
export type ScriptRule =
  | 'unclosed-function'
  | 'group-conflict'
  | 'duplicate-group'
  | 'choice-type'
  | 'unknown-type'
  | 'invalid-alias'
  | 'iteration-syntax'
  | 'safety-subtype'
  | 'signal'
  | 'missing-target'
  | 'nesting-depth';

/**
 * A script-authoring defect found while analyzing or expanding a script.
 * Messages carry the 1-based line number when one is known.
 */
export class ScriptError extends Error {
  readonly rule: ScriptRule;
  readonly line: number | undefined;

  constructor(rule: ScriptRule, message: string, line?: number) {
    super(line !== undefined ? `Line ${line}: ${message}` : message);
    this.name = 'ScriptError';
    this.rule = rule;
    this.line = line;
  }
}

/**
 * Bad command-line input for a script's generated options
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
