import { describe, expect, it } from 'vitest';

import {
  commentContent,
  detectMacroType,
  inferIterationKind,
  isEndForLine,
  parseIterationHeader,
  renderSource,
  sourceVariable,
} from '../../src/macros/syntax.js';

describe('commentContent', () => {
  it('strips # and surrounding whitespace', () => {
    expect(commentContent('  #  for x in y ')).toBe('for x in y');
  });

  it('returns null for code and shebangs', () => {
    expect(commentContent('echo hi')).toBeNull();
    expect(commentContent('#!/bin/bash')).toBeNull();
  });
});

describe('detectMacroType', () => {
  it('detects iteration macros', () => {
    expect(detectMacroType('for f in *.sh')).toBe('iteration');
  });

  it('detects safety macros case-insensitively', () => {
    expect(detectMacroType('set strict')).toBe('safety');
    expect(detectMacroType('Trap Cleanup EXIT')).toBe('safety');
  });

  it('treats other two-word set/trap comments as safety macros', () => {
    expect(detectMacroType('set debug')).toBe('safety');
  });

  it('ignores prose', () => {
    expect(detectMacroType('set the table')).toBeNull();
    expect(detectMacroType('for the win')).toBeNull();
  });
});

describe('isEndForLine', () => {
  it('matches the close marker', () => {
    expect(isEndForLine('  # endfor ')).toBe(true);
    expect(isEndForLine('#ENDFOR')).toBe(true);
    expect(isEndForLine('# end for')).toBe(false);
  });
});

describe('parseIterationHeader', () => {
  it('parses a plain header', () => {
    expect(parseIterationHeader('for f in *.txt')).toEqual({
      ok: true,
      value: {
        iteratorVar: 'f',
        source: '*.txt',
        explicitKind: null,
        additionalParams: [],
        directCall: null,
      },
    });
  });

  it('parses kind, parameters and direct call together', () => {
    expect(
      parseIterationHeader('for line in $INPUT as array | with a b -> handle')
    ).toEqual({
      ok: true,
      value: {
        iteratorVar: 'line',
        source: '$INPUT',
        explicitKind: 'array',
        additionalParams: ['a', 'b'],
        directCall: 'handle',
      },
    });
  });

  it('maps `as file` to line iteration', () => {
    const result = parseIterationHeader('for l in data.txt as file');
    expect(result.ok && result.value.explicitKind).toBe('file_lines');
  });

  it('rejects malformed headers', () => {
    expect(parseIterationHeader('for x in LIST as bogus')).toEqual({
      ok: false,
      reason: "unknown iteration kind 'as bogus'",
    });
    expect(parseIterationHeader('for x in LIST -> 9bad')).toEqual({
      ok: false,
      reason: "invalid function name after '->': '9bad'",
    });
    expect(parseIterationHeader('for x in LIST | foo')).toEqual({
      ok: false,
      reason: "expected '| with PARAMS' in 'for x in LIST | foo'",
    });
    expect(parseIterationHeader('for x in -> f')).toEqual({
      ok: false,
      reason: "missing iteration source in 'for x in -> f'",
    });
  });
});

describe('sourceVariable', () => {
  it('names the variable of a single-variable source', () => {
    expect(sourceVariable('LIST')).toBe('LIST');
    expect(sourceVariable('$FILES')).toBe('FILES');
    expect(sourceVariable('${X}')).toBe('X');
  });

  it('returns null for expressions', () => {
    expect(sourceVariable('*.txt')).toBeNull();
    expect(sourceVariable('${X[@]}')).toBeNull();
  });
});

describe('inferIterationKind', () => {
  it.each([
    ['$INPUT_FILE', 'file_lines'],
    ['logfile', 'file_lines'],
    ['{1..5}', 'range'],
    ['build/', 'directory'],
    ['*.txt', 'pattern'],
    ['LIST', 'array'],
    ['$(ls)', 'array'],
  ])('infers %s as %s', (source, kind) => {
    expect(inferIterationKind(source)).toBe(kind);
  });
});

describe('renderSource', () => {
  it('wraps bare identifiers and leaves expressions verbatim', () => {
    expect(renderSource('LIST')).toBe('${LIST}');
    expect(renderSource('$FILES')).toBe('$FILES');
    expect(renderSource('*.txt')).toBe('*.txt');
    expect(renderSource('{1..5}')).toBe('{1..5}');
  });
});
