/**
 * Trap signal name validation
 */

import { DEFAULT_TRAP_SIGNALS } from '../utils/constants.js';
import type { ParseOutcome } from '../macros/types.js';

/** POSIX signal names plus the shell's trap pseudo-signals */
export const TRAP_SIGNALS: ReadonlySet<string> = new Set([
  'EXIT',
  'ERR',
  'DEBUG',
  'RETURN',
  'HUP',
  'INT',
  'QUIT',
  'ILL',
  'TRAP',
  'ABRT',
  'BUS',
  'FPE',
  'KILL',
  'USR1',
  'SEGV',
  'USR2',
  'PIPE',
  'ALRM',
  'TERM',
  'CHLD',
  'CONT',
  'STOP',
  'TSTP',
  'TTIN',
  'TTOU',
  'URG',
  'XCPU',
  'XFSZ',
  'VTALRM',
  'PROF',
  'SYS',
]);

/**
 * Normalize a signal name: uppercase, without a SIG prefix.
 * Returns null for names the shell would not accept.
 */
export function normalizeSignal(name: string): string | null {
  const upper = name.toUpperCase();
  const bare = upper.startsWith('SIG') && upper !== 'SIG' ? upper.slice(3) : upper;
  return TRAP_SIGNALS.has(bare) ? bare : null;
}

/**
 * Parse a space- or comma-separated signal list.
 * An empty list yields the default trap signals.
 */
export function parseSignalList(text: string): ParseOutcome<string[]> {
  const names = text.split(/[\s,]+/).filter((name) => name !== '');
  if (names.length === 0) {
    return { ok: true, value: [...DEFAULT_TRAP_SIGNALS] };
  }

  const signals: string[] = [];
  for (const name of names) {
    const signal = normalizeSignal(name);
    if (!signal) {
      return { ok: false, reason: `invalid signal name '${name}'` };
    }
    if (!signals.includes(signal)) {
      signals.push(signal);
    }
  }
  return { ok: true, value: signals };
}
