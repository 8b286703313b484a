/**
 * Iteration macro expansion
 *
 * Walks the script once, keeping an explicit stack of open iteration frames.
 * Lines are emitted into the top frame's body, or straight to the output when
 * no frame is open. A block frame (one with a matching `# endfor`) closes at
 * its marker; a single-line frame closes as soon as it receives one unit, so
 * `# for x in L` followed by one line, one function or one nested macro wraps
 * exactly that. Safety macro comments never become a single-line body; they
 * are emitted ahead of the waiting loop.
 *
 * Output is kept as units (a line, or a generated block with the spans of
 * the loops inside it) so the safety pass can treat a generated loop as one
 * target.
 */

import { leadingWhitespace } from '../script/lexical.js';
import type { ArgumentKind } from '../script/types.js';
import { ScriptError } from '../types/errors.js';
import {
  DEFAULT_MAX_NESTING_DEPTH,
  GENERATED_INDENT,
} from '../utils/constants.js';
import { functionCall, loopFooter, loopHeader, renderLoop } from './codegen.js';
import { isFunctionDefined } from './functions.js';
import { findTargetForMacro, resolveIterationKind } from './parser.js';
import {
  commentContent,
  detectMacroType,
  isEndForLine,
  matchIterationOpen,
  parseIterationHeader,
} from './syntax.js';
import type {
  ExpandedLines,
  IterationHeader,
  IterationKind,
  LineRange,
} from './types.js';

export interface ExpansionOptions {
  /** Annotation types by uppercase variable name, used to infer file iteration */
  variableKinds?: ReadonlyMap<string, ArgumentKind>;
  /** Deepest allowed frame stack */
  maxNestingDepth?: number;
}

/**
 * An open iteration macro collecting its body
 */
export interface IterationFrame {
  indent: string;
  iteratorVar: string;
  source: string;
  kind: IterationKind;
  params: string[];
  /** Closes after its first unit instead of at `# endfor` */
  singleLine: boolean;
  body: ExpandedLines[];
}

function lineUnit(line: string): ExpandedLines {
  return { lines: [line], blocks: [] };
}

/**
 * A generated block, taken whole by a `trap cleanup` in front of it
 */
function loopUnit(text: string): ExpandedLines {
  const lines = text.split('\n');
  return { lines, blocks: [{ start: 0, end: lines.length - 1 }] };
}

/**
 * Join units, shifting their loop spans to the combined position
 */
function concatUnits(units: readonly ExpandedLines[], offset = 0): ExpandedLines {
  const lines: string[] = [];
  const blocks: LineRange[] = [];
  for (const unit of units) {
    const at = offset + lines.length;
    blocks.push(
      ...unit.blocks.map(({ start, end }) => ({ start: start + at, end: end + at }))
    );
    lines.push(...unit.lines);
  }
  return { lines, blocks };
}

function isSafetyComment(line: string): boolean {
  const content = commentContent(line);
  return content !== null && detectMacroType(content) === 'safety';
}

const BARE_CALL = /^(\s*)([A-Za-z_][A-Za-z0-9_]*)\s*$/;

/**
 * Pair block-opening iteration macros with their `# endfor` lines.
 * Direct-call macros (`-> FUNC`) never open a block. Returns
 * open line -> endfor line; unpaired markers are absent.
 */
export function pairIterationBlocks(lines: readonly string[]): Map<number, number> {
  const pairs = new Map<number, number>();
  const open: number[] = [];

  for (const [i, line] of lines.entries()) {
    const macro = matchIterationOpen(line);
    if (macro) {
      if (!/->\s*\S*\s*$/.test(macro.content)) {
        open.push(i);
      }
    } else if (isEndForLine(line)) {
      const start = open.pop();
      if (start !== undefined) {
        pairs.set(start, i);
      }
    }
  }

  return pairs;
}

/**
 * A closed frame as a loop block
 */
function frameUnit(frame: IterationFrame): ExpandedLines {
  const body = concatUnits(frame.body, 1);
  const lines = [
    loopHeader(frame.indent, frame.kind, frame.iteratorVar, frame.source),
    ...body.lines,
    loopFooter(frame.indent, frame.kind, frame.source),
  ];
  return {
    lines,
    blocks: [{ start: 0, end: lines.length - 1 }, ...body.blocks],
  };
}

/**
 * Stack machine over script lines
 */
export class IterationExpander {
  private readonly lines: readonly string[];
  private readonly pairs: Map<number, number>;
  private readonly closers: Set<number>;
  private readonly variableKinds: ReadonlyMap<string, ArgumentKind> | undefined;
  private readonly maxDepth: number;
  private readonly stack: IterationFrame[] = [];
  private readonly output: ExpandedLines[] = [];

  constructor(lines: readonly string[], options: ExpansionOptions = {}) {
    this.lines = lines;
    this.pairs = pairIterationBlocks(lines);
    this.closers = new Set(this.pairs.values());
    this.variableKinds = options.variableKinds;
    this.maxDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  }

  /**
   * Current nesting depth
   */
  get depth(): number {
    return this.stack.length;
  }

  /**
   * Process the line at `index`; returns the index of the next line to read
   */
  step(index: number): number {
    const line = this.lines[index] ?? '';

    const open = matchIterationOpen(line);
    if (open) {
      return this.openMacro(index, open.indent, open.content);
    }

    if (this.closers.has(index)) {
      const frame = this.stack.pop();
      if (frame) {
        this.emit(frameUnit(frame));
      }
      return index + 1;
    }

    if (isSafetyComment(line)) {
      this.emitAhead(lineUnit(line));
      return index + 1;
    }

    this.emit(lineUnit(this.rewriteBareCall(line)));
    return index + 1;
  }

  /**
   * Expand every line
   */
  run(): ExpandedLines {
    let index = 0;
    while (index < this.lines.length) {
      index = this.step(index);
    }
    return concatUnits(this.output);
  }

  private openMacro(index: number, indent: string, content: string): number {
    const header = this.parseHeader(index, content);
    const kind = resolveIterationKind(
      header.source,
      header.explicitKind,
      this.variableKinds
    );

    if (header.directCall) {
      const call = functionCall(
        indent + GENERATED_INDENT,
        header.directCall,
        header.iteratorVar,
        header.additionalParams
      );
      this.emit(
        loopUnit(renderLoop(indent, kind, header.iteratorVar, header.source, [call]))
      );
      return index + 1;
    }

    if (this.pairs.has(index)) {
      this.push(index, indent, header, kind, false);
      return index + 1;
    }

    // Safety comments between the macro and its body go ahead of the loop
    let before = index;
    while (isSafetyComment(this.lines[before + 1] ?? '')) {
      before++;
    }
    const target = findTargetForMacro(this.lines, before);
    if (!target) {
      throw new ScriptError(
        'missing-target',
        `no target found for macro '${content}'`,
        index + 1
      );
    }

    if (target.kind === 'function') {
      const call = functionCall(
        indent + GENERATED_INDENT,
        target.name,
        header.iteratorVar,
        header.additionalParams
      );
      const loop = renderLoop(indent, kind, header.iteratorVar, header.source, [
        call,
      ]);
      for (const skipped of this.lines.slice(index + 1, before + 1)) {
        this.emitAhead(lineUnit(skipped));
      }
      this.emit(loopUnit(`${target.content}\n\n${loop}`));
      return target.endLine + 1;
    }

    this.push(index, indent, header, kind, true);
    return index + 1;
  }

  private parseHeader(index: number, content: string): IterationHeader {
    const parsed = parseIterationHeader(content);
    if (!parsed.ok) {
      throw new ScriptError(
        'iteration-syntax',
        `invalid iteration macro: ${parsed.reason}`,
        index + 1
      );
    }
    return parsed.value;
  }

  private push(
    index: number,
    indent: string,
    header: IterationHeader,
    kind: IterationKind,
    singleLine: boolean
  ): void {
    if (this.stack.length >= this.maxDepth) {
      throw new ScriptError(
        'nesting-depth',
        `iteration macros nested deeper than ${this.maxDepth}`,
        index + 1
      );
    }
    this.stack.push({
      indent,
      iteratorVar: header.iteratorVar,
      source: header.source,
      kind,
      params: header.additionalParams,
      singleLine,
      body: [],
    });
  }

  /**
   * Append a unit to the current emission target, closing single-line
   * frames that it completes
   */
  private emit(unit: ExpandedLines): void {
    let next = unit;
    for (;;) {
      const top = this.stack.at(-1);
      if (!top) {
        this.output.push(next);
        return;
      }
      top.body.push(next);
      if (!top.singleLine) {
        return;
      }
      this.stack.pop();
      next = frameUnit(top);
    }
  }

  /**
   * Append a unit in front of the single-line frames still waiting for
   * their body, so it lands before their loops
   */
  private emitAhead(unit: ExpandedLines): void {
    let below = this.stack.length;
    while (below > 0 && this.stack[below - 1]?.singleLine) {
      below--;
    }
    const parent = this.stack[below - 1];
    if (parent) {
      parent.body.push(unit);
    } else {
      this.output.push(unit);
    }
  }

  /**
   * Inside a single-line frame, a bare call of a function defined in the
   * script receives the iterator value
   */
  private rewriteBareCall(line: string): string {
    const top = this.stack.at(-1);
    if (!top?.singleLine) {
      return line;
    }
    const match = BARE_CALL.exec(line);
    const name = match?.[2];
    if (!name || !isFunctionDefined(this.lines, name)) {
      return line;
    }
    return functionCall(
      match[1] ?? leadingWhitespace(line),
      name,
      top.iteratorVar,
      top.params
    );
  }
}

/**
 * Expand iteration macros in script lines
 */
export function expandIterationMacros(
  lines: readonly string[],
  options: ExpansionOptions = {}
): string[] {
  return new IterationExpander(lines, options).run().lines;
}
