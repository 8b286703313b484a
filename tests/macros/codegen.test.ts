import { describe, expect, it } from 'vitest';

import {
  cleanupHandlerName,
  functionCall,
  loopHeader,
  renderLoop,
  renderTrapHandler,
} from '../../src/macros/codegen.js';

describe('loop rendering', () => {
  it('renders a for loop over a bare variable', () => {
    expect(loopHeader('  ', 'array', 'x', 'LIST')).toBe('  for x in ${LIST}; do');
  });

  it('renders a read loop for file lines', () => {
    expect(renderLoop('', 'file_lines', 'line', 'INPUT', ['echo "$line"'])).toBe(
      'while IFS= read -r line; do\necho "$line"\ndone < ${INPUT}'
    );
  });

  it('leaves glob sources verbatim', () => {
    expect(renderLoop('', 'pattern', 'f', '*.sh', ['echo $f'])).toBe(
      'for f in *.sh; do\necho $f\ndone'
    );
  });
});

describe('functionCall', () => {
  it('quotes the iterator and extra parameters', () => {
    expect(functionCall('    ', 'process', 'f', ['--fast', 'x'])).toBe(
      '    process "$f" "--fast" "x"'
    );
  });
});

describe('trap handlers', () => {
  it('names handlers after the target', () => {
    expect(
      cleanupHandlerName({ kind: 'line', startLine: 2, endLine: 2, content: 'rm x' })
    ).toBe('_cleanup_line_3');
    expect(
      cleanupHandlerName({
        kind: 'function',
        name: 'teardown',
        startLine: 0,
        endLine: 2,
        content: '',
      })
    ).toBe('_cleanup_teardown');
  });

  it('wraps a line target', () => {
    expect(
      renderTrapHandler(
        { kind: 'line', startLine: 2, endLine: 2, content: '  rm -f /tmp/x' },
        ['EXIT']
      )
    ).toEqual([
      '_cleanup_line_3() {',
      '    local exit_code=$?',
      '    rm -f /tmp/x',
      '    exit $exit_code',
      '}',
      'trap _cleanup_line_3 EXIT',
    ]);
  });

  it('keeps relative indentation of a multi-line target', () => {
    expect(
      renderTrapHandler(
        {
          kind: 'line',
          startLine: 0,
          endLine: 2,
          content: '  for f in *; do\n    rm "$f"\n  done',
        },
        ['EXIT']
      )
    ).toEqual([
      '_cleanup_line_1() {',
      '    local exit_code=$?',
      '    for f in *; do',
      '      rm "$f"',
      '    done',
      '    exit $exit_code',
      '}',
      'trap _cleanup_line_1 EXIT',
    ]);
  });

  it('reuses a function body', () => {
    expect(
      renderTrapHandler(
        {
          kind: 'function',
          name: 'cleanup',
          startLine: 0,
          endLine: 2,
          content: 'cleanup() {\n  rm -rf "$TMP"\n}',
        },
        ['EXIT', 'INT']
      )
    ).toEqual([
      '_cleanup_cleanup() {',
      '    local exit_code=$?',
      '  rm -rf "$TMP"',
      '    exit $exit_code',
      '}',
      'trap _cleanup_cleanup EXIT INT',
    ]);
  });

  it('unwraps a one-line function body', () => {
    const lines = renderTrapHandler(
      {
        kind: 'function',
        name: 'cleanup',
        startLine: 0,
        endLine: 0,
        content: 'cleanup() { rm -f a; }',
      },
      ['TERM']
    );
    expect(lines[2]).toBe('    rm -f a');
  });
});
