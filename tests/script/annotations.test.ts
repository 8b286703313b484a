import { describe, expect, it } from 'vitest';

import {
  parseAnnotations,
  parseGroupDeclarations,
  parseScriptDescription,
  readAnnotationLine,
} from '../../src/script/annotations.js';
import { ScriptError } from '../../src/types/errors.js';

function catchScriptError(fn: () => unknown): ScriptError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ScriptError) return error;
    throw error;
  }
  throw new Error('expected a ScriptError');
}

describe('readAnnotationLine', () => {
  it('returns null for ordinary comments and code', () => {
    expect(readAnnotationLine('# just a note')).toBeNull();
    expect(readAnnotationLine('# for x in LIST')).toBeNull();
    expect(readAnnotationLine('#!/bin/bash')).toBeNull();
    expect(readAnnotationLine('echo "NAME: x"')).toBeNull();
  });

  it('reads every part of a full annotation', () => {
    expect(
      readAnnotationLine('# PORT (int) [alias: -p]: Port to use. Default: 8080')
    ).toEqual({
      name: 'PORT',
      typeName: 'int',
      choices: null,
      markers: [{ key: 'alias', value: '-p' }],
      help: 'Port to use',
      default: '8080',
    });
  });
});

describe('parseAnnotations', () => {
  it('parses type, alias, help and default', () => {
    const annotations = parseAnnotations(
      '# PORT (int) [alias: -p]: Port to listen on. Default: 8080'
    );

    expect(annotations.get('PORT')).toEqual({
      kind: 'int',
      help: 'Port to listen on',
      default: '8080',
      alias: '-p',
    });
  });

  it('normalizes names to uppercase and trims choices', () => {
    const annotations = parseAnnotations('# mode (choice[fast, slow ]): Run mode');

    expect(annotations.get('MODE')).toEqual({
      kind: 'choice',
      help: 'Run mode',
      choices: ['fast', 'slow'],
    });
  });

  it('resolves type synonyms', () => {
    const annotations = parseAnnotations(
      [
        '# VERBOSE (boolean): Chatty output.',
        '# RATIO (number): Mix ratio',
        '# SRC (path): Source file',
        '# LEVEL (enum[a, b]): Level',
      ].join('\n')
    );

    expect(annotations.get('VERBOSE')).toEqual({ kind: 'bool', help: 'Chatty output' });
    expect(annotations.get('RATIO')?.kind).toBe('float');
    expect(annotations.get('SRC')?.kind).toBe('file');
    expect(annotations.get('LEVEL')?.kind).toBe('choice');
  });

  it('defaults to str without a type', () => {
    expect(parseAnnotations('# TARGET: Where to deploy').get('TARGET')).toEqual({
      kind: 'str',
      help: 'Where to deploy',
    });
  });

  it('promotes bare choices to the choice type', () => {
    expect(parseAnnotations('# SIZE ([s, m, l]): Size').get('SIZE')).toEqual({
      kind: 'choice',
      help: 'Size',
      choices: ['s', 'm', 'l'],
    });
  });

  it('does not treat the description line as an annotation', () => {
    const annotations = parseAnnotations('# Description: Deploys things');
    expect(annotations.size).toBe(0);
  });

  it('rejects unknown types', () => {
    const error = catchScriptError(() => parseAnnotations('# X (widget): y'));

    expect(error.rule).toBe('unknown-type');
    expect(error.line).toBe(1);
    expect(error.message).toMatch(/^Line 1: unknown argument type 'widget' for X/);
  });

  it('rejects choices on an explicit non-choice type', () => {
    const error = catchScriptError(() =>
      parseAnnotations('echo hi\n# N (int[1, 2]): n')
    );

    expect(error.rule).toBe('choice-type');
    expect(error.line).toBe(2);
  });

  it('rejects a choice type without options', () => {
    const error = catchScriptError(() => parseAnnotations('# N (choice): n'));
    expect(error.rule).toBe('choice-type');
  });

  it('rejects group and exclusive group on one annotation', () => {
    const error = catchScriptError(() =>
      parseAnnotations('# A [group: G] [exclusive_group: E]: a')
    );
    expect(error.rule).toBe('group-conflict');
  });

  it('rejects invalid aliases', () => {
    expect(catchScriptError(() => parseAnnotations('# A [alias: -h]: a')).rule).toBe(
      'invalid-alias'
    );
    expect(
      catchScriptError(() => parseAnnotations('# A [alias: --long]: a')).rule
    ).toBe('invalid-alias');
  });

  it('merges group declarations into annotations', () => {
    const annotations = parseAnnotations(
      '# HOST (str): Host name\n# group HOST, PORT as Net'
    );

    expect(annotations.get('HOST')).toEqual({
      kind: 'str',
      help: 'Host name',
      grouping: { kind: 'group', name: 'Net' },
    });
    expect(annotations.get('PORT')).toEqual({
      kind: 'str',
      help: '',
      grouping: { kind: 'group', name: 'Net' },
    });
  });

  it('accepts a matching group marker and declaration', () => {
    const annotations = parseAnnotations('# HOST [group: Net]: h\n# group HOST as Net');
    expect(annotations.get('HOST')?.grouping).toEqual({ kind: 'group', name: 'Net' });
  });

  it('rejects a declaration that disagrees with the marker', () => {
    const error = catchScriptError(() =>
      parseAnnotations('# HOST [exclusive_group: X]: h\n# group HOST as Net')
    );

    expect(error.rule).toBe('group-conflict');
    expect(error.line).toBe(2);
  });
});

describe('parseGroupDeclarations', () => {
  it('reads named and numbered groups', () => {
    const groups = parseGroupDeclarations(
      [
        '# group HOST, PORT as Connection',
        '# one of VERBOSE, QUIET',
        '# group a, b',
        '# one of X, Y as Output',
      ].join('\n')
    );

    expect(groups).toEqual(
      new Map([
        ['HOST', { kind: 'group', name: 'Connection' }],
        ['PORT', { kind: 'group', name: 'Connection' }],
        ['VERBOSE', { kind: 'exclusive', name: 'ExclusiveGroup1' }],
        ['QUIET', { kind: 'exclusive', name: 'ExclusiveGroup1' }],
        ['A', { kind: 'group', name: 'Group1' }],
        ['B', { kind: 'group', name: 'Group1' }],
        ['X', { kind: 'exclusive', name: 'Output' }],
        ['Y', { kind: 'exclusive', name: 'Output' }],
      ])
    );
  });

  it('rejects a variable declared in two groups', () => {
    const error = catchScriptError(() =>
      parseGroupDeclarations('# group A as First\n# one of A, B')
    );

    expect(error.rule).toBe('duplicate-group');
    expect(error.message).toBe('Line 2: variable A is declared in more than one group');
  });
});

describe('parseScriptDescription', () => {
  it('returns the first description comment', () => {
    expect(
      parseScriptDescription('#!/bin/bash\n#Description: Backs up files\n# description: later\n')
    ).toBe('Backs up files');
  });

  it('returns null without one', () => {
    expect(parseScriptDescription('echo hi')).toBeNull();
  });
});
