import { describe, expect, it } from 'vitest';

import { normalizeSignal, parseSignalList } from '../../src/parsers/signals.js';

describe('normalizeSignal', () => {
  it('uppercases names', () => {
    expect(normalizeSignal('term')).toBe('TERM');
  });

  it('strips a SIG prefix', () => {
    expect(normalizeSignal('SIGINT')).toBe('INT');
    expect(normalizeSignal('sighup')).toBe('HUP');
  });

  it('accepts shell pseudo-signals', () => {
    expect(normalizeSignal('EXIT')).toBe('EXIT');
    expect(normalizeSignal('ERR')).toBe('ERR');
  });

  it('rejects unknown names', () => {
    expect(normalizeSignal('BOGUS')).toBeNull();
    expect(normalizeSignal('SIG')).toBeNull();
  });
});

describe('parseSignalList', () => {
  it('defaults to EXIT ERR INT TERM', () => {
    expect(parseSignalList('')).toEqual({
      ok: true,
      value: ['EXIT', 'ERR', 'INT', 'TERM'],
    });
    expect(parseSignalList('   ')).toEqual({
      ok: true,
      value: ['EXIT', 'ERR', 'INT', 'TERM'],
    });
  });

  it('splits on spaces and commas', () => {
    expect(parseSignalList(' EXIT, sigterm  HUP')).toEqual({
      ok: true,
      value: ['EXIT', 'TERM', 'HUP'],
    });
  });

  it('drops duplicates', () => {
    expect(parseSignalList('INT SIGINT int')).toEqual({
      ok: true,
      value: ['INT'],
    });
  });

  it('reports the first invalid name', () => {
    expect(parseSignalList('EXIT NOPE')).toEqual({
      ok: false,
      reason: "invalid signal name 'NOPE'",
    });
  });
});
