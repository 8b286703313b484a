/**
 * Argument type registry
 *
 * Each canonical type lists the names an annotation may use for it and how
 * a command-line value is checked and normalized.
 */

import { UsageError } from '../types/errors.js';
import type { ArgumentAnnotation, ArgumentKind } from './types.js';

interface ArgumentType {
  kind: ArgumentKind;
  names: readonly string[];
  /** Normalized value, or an error message */
  check(value: string, annotation: ArgumentAnnotation): { value: string } | { error: string };
}

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);

const ARGUMENT_TYPES: readonly ArgumentType[] = [
  {
    kind: 'str',
    names: ['str', 'string', 'text'],
    check: (value) => ({ value }),
  },
  {
    kind: 'int',
    names: ['int', 'integer'],
    check: (value) =>
      /^[+-]?\d+$/.test(value.trim())
        ? { value }
        : { error: `'${value}' is not a valid integer` },
  },
  {
    kind: 'float',
    names: ['float', 'number', 'decimal', 'real'],
    check: (value) =>
      value.trim() !== '' && Number.isFinite(Number(value))
        ? { value }
        : { error: `'${value}' is not a valid decimal number` },
  },
  {
    kind: 'bool',
    names: ['bool', 'boolean', 'flag'],
    check: (value) => {
      const lower = value.toLowerCase();
      if (TRUE_WORDS.has(lower)) return { value: 'true' };
      if (FALSE_WORDS.has(lower)) return { value: 'false' };
      return {
        error: `'${value}' is not a valid boolean (use true/false, yes/no, 1/0, on/off)`,
      };
    },
  },
  {
    kind: 'choice',
    names: ['choice', 'enum', 'select', 'option'],
    check: (value, annotation) => {
      const choices = annotation.kind === 'choice' ? annotation.choices : [];
      return choices.includes(value)
        ? { value }
        : { error: `'${value}' is not a valid choice. Options: ${choices.join(', ')}` };
    },
  },
  {
    kind: 'file',
    names: ['file', 'path', 'filepath'],
    check: (value) =>
      value !== '' && !value.includes('\0')
        ? { value }
        : { error: `'${value}' is not a valid file path` },
  },
];

const BY_NAME = new Map<string, ArgumentType>(
  ARGUMENT_TYPES.flatMap((type) => type.names.map((name) => [name, type] as const))
);

const BY_KIND = new Map<ArgumentKind, ArgumentType>(
  ARGUMENT_TYPES.map((type) => [type.kind, type] as const)
);

/**
 * Canonical kind for a type name (case-insensitive), or null when unknown
 */
export function resolveArgumentKind(typeName: string): ArgumentKind | null {
  return BY_NAME.get(typeName.trim().toLowerCase())?.kind ?? null;
}

/**
 * Every accepted type name, sorted
 */
export function supportedTypeNames(): string[] {
  return [...BY_NAME.keys()].sort();
}

/**
 * Check a value against its annotation and return the normalized form
 * (booleans become `true` / `false`)
 *
 * @throws UsageError naming the option when the value does not fit
 */
export function validateValue(
  optionName: string,
  value: string,
  annotation: ArgumentAnnotation
): string {
  const type = BY_KIND.get(annotation.kind);
  if (!type) {
    return value;
  }
  const result = type.check(value, annotation);
  if ('error' in result) {
    throw new UsageError(`argument --${optionName}: ${result.error}`);
  }
  return result.value;
}
