/**
 * Argument annotation parser
 *
 * Per-variable comments:
 *   # NAME (type) [alias: -x] [group: G]: Help text. Default: value
 *   # MODE (choice[fast, slow]) [exclusive_group: Speed]: Run mode
 *
 * Group declarations:
 *   # group HOST, PORT as Connection
 *   # one of VERBOSE, QUIET
 *
 * Names are case-insensitive and normalized to uppercase.
 */

import { ScriptError } from '../types/errors.js';
import { resolveArgumentKind, supportedTypeNames } from './argument-types.js';
import { splitLines } from './lexical.js';
import type {
  AnnotationBase,
  ArgumentAnnotation,
  ArgumentKind,
  Grouping,
} from './types.js';

const GROUP_DECLARATION =
  /^#\s*(group|one\s+of)\s+([A-Za-z_]\w*(?:\s*,\s*[A-Za-z_]\w*)*)(?:\s+as\s+(\S.*?))?\s*$/i;

const DESCRIPTION = /^#\s*description\s*:\s*(.+)$/i;

const DEFAULT_SUFFIX = /^(.*?)\.\s*default\s*:\s*(.*)$/is;

const ALIAS = /^-[A-Za-z0-9]$/;

/** Names that look like annotations but are script metadata */
const RESERVED_NAMES = new Set(['DESCRIPTION']);

/**
 * A group declaration entry with the line that made it
 */
interface DeclaredGrouping {
  grouping: Grouping;
  /** 1-based */
  line: number;
}

/**
 * Parse state over one comment line
 */
interface Cursor {
  text: string;
  pos: number;
}

function peek(cursor: Cursor): string {
  return cursor.text[cursor.pos] ?? '';
}

function skipSpaces(cursor: Cursor): void {
  while (/\s/.test(peek(cursor))) {
    cursor.pos++;
  }
}

function readIdentifier(cursor: Cursor): string | null {
  const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(cursor.text.slice(cursor.pos));
  if (!match) return null;
  cursor.pos += match[0].length;
  return match[0];
}

/**
 * Read up to (not including) `close`; null when it never appears
 */
function readUntil(cursor: Cursor, close: string): string | null {
  const end = cursor.text.indexOf(close, cursor.pos);
  if (end === -1) return null;
  const value = cursor.text.slice(cursor.pos, end);
  cursor.pos = end + 1;
  return value;
}

/**
 * Fields read from one annotation line before validation
 */
interface RawAnnotation {
  name: string;
  typeName: string | null;
  choices: string[] | null;
  markers: Array<{ key: string; value: string }>;
  help: string;
  default: string | null;
}

/**
 * Read the `(type[choices])` spec after the name
 */
function readTypeSpec(
  cursor: Cursor
): { typeName: string | null; choices: string[] | null } | null {
  const inner = readUntil(cursor, ')');
  if (inner === null) return null;

  const bracket = inner.indexOf('[');
  if (bracket === -1) {
    return { typeName: inner.trim() || null, choices: null };
  }
  const close = inner.lastIndexOf(']');
  if (close < bracket) return null;

  const choices = inner
    .slice(bracket + 1, close)
    .split(',')
    .map((choice) => choice.trim())
    .filter((choice) => choice !== '');
  return { typeName: inner.slice(0, bracket).trim() || null, choices };
}

/**
 * Match the annotation grammar against a comment line.
 * Returns null for lines that are not annotations.
 */
export function readAnnotationLine(line: string): RawAnnotation | null {
  const cursor: Cursor = { text: line.trim(), pos: 0 };
  if (peek(cursor) !== '#') return null;
  cursor.pos++;
  skipSpaces(cursor);

  const name = readIdentifier(cursor);
  if (!name) return null;
  skipSpaces(cursor);

  let typeName: string | null = null;
  let choices: string[] | null = null;
  if (peek(cursor) === '(') {
    cursor.pos++;
    const spec = readTypeSpec(cursor);
    if (!spec) return null;
    ({ typeName, choices } = spec);
    skipSpaces(cursor);
  }

  const markers: RawAnnotation['markers'] = [];
  while (peek(cursor) === '[') {
    cursor.pos++;
    const body = readUntil(cursor, ']');
    const separator = body?.indexOf(':') ?? -1;
    if (body === null || separator === -1) return null;
    markers.push({
      key: body.slice(0, separator).trim().toLowerCase(),
      value: body.slice(separator + 1).trim(),
    });
    skipSpaces(cursor);
  }

  if (peek(cursor) !== ':') return null;
  const rest = cursor.text.slice(cursor.pos + 1).trim();

  const withDefault = DEFAULT_SUFFIX.exec(rest);
  if (withDefault) {
    return {
      name,
      typeName,
      choices,
      markers,
      help: (withDefault[1] ?? '').trim(),
      default: (withDefault[2] ?? '').trim() || null,
    };
  }
  return {
    name,
    typeName,
    choices,
    markers,
    help: rest.replace(/\.$/, '').trim(),
    default: null,
  };
}

/**
 * Turn a matched line into a validated annotation
 */
function buildAnnotation(raw: RawAnnotation, line: number): ArgumentAnnotation {
  let kind: ArgumentKind = 'str';
  if (raw.typeName !== null) {
    const resolved = resolveArgumentKind(raw.typeName);
    if (!resolved) {
      throw new ScriptError(
        'unknown-type',
        `unknown argument type '${raw.typeName}' for ${raw.name.toUpperCase()} (known types: ${supportedTypeNames().join(', ')})`,
        line
      );
    }
    kind = resolved;
  } else if (raw.choices !== null) {
    kind = 'choice';
  }

  if (raw.choices !== null && kind !== 'choice') {
    throw new ScriptError(
      'choice-type',
      `choices given for ${raw.name.toUpperCase()}, whose type is '${kind}'`,
      line
    );
  }

  const base: AnnotationBase = { help: raw.help };
  if (raw.default !== null) base.default = raw.default;

  for (const marker of raw.markers) {
    if (marker.key === 'alias') {
      if (!ALIAS.test(marker.value) || marker.value === '-h') {
        throw new ScriptError(
          'invalid-alias',
          `alias '${marker.value}' must be a single-dash, single-character flag other than -h`,
          line
        );
      }
      base.alias = marker.value;
    } else if (marker.key === 'group' || marker.key === 'exclusive_group') {
      if (base.grouping) {
        throw new ScriptError(
          'group-conflict',
          `${raw.name.toUpperCase()} cannot be in both a group and an exclusive group`,
          line
        );
      }
      base.grouping = {
        kind: marker.key === 'group' ? 'group' : 'exclusive',
        name: marker.value,
      };
    }
  }

  if (kind === 'choice') {
    if (!raw.choices || raw.choices.length === 0) {
      throw new ScriptError(
        'choice-type',
        `choice type for ${raw.name.toUpperCase()} needs at least one option`,
        line
      );
    }
    return { ...base, kind, choices: raw.choices };
  }
  return { ...base, kind };
}

function collectGroupDeclarations(scriptText: string): Map<string, DeclaredGrouping> {
  const declared = new Map<string, DeclaredGrouping>();
  let groupCount = 0;
  let exclusiveCount = 0;

  for (const [i, text] of splitLines(scriptText).lines.entries()) {
    const match = GROUP_DECLARATION.exec(text.trim());
    if (!match) continue;

    const exclusive = (match[1] ?? '').toLowerCase() !== 'group';
    let name = match[3]?.trim();
    if (!name) {
      name = exclusive ? `ExclusiveGroup${++exclusiveCount}` : `Group${++groupCount}`;
    }
    const grouping: Grouping = { kind: exclusive ? 'exclusive' : 'group', name };

    for (const variable of (match[2] ?? '').split(',')) {
      const key = variable.trim().toUpperCase();
      if (declared.has(key)) {
        throw new ScriptError(
          'duplicate-group',
          `variable ${key} is declared in more than one group`,
          i + 1
        );
      }
      declared.set(key, { grouping, line: i + 1 });
    }
  }

  return declared;
}

/**
 * Group and exclusive-group membership from `# group ...` and
 * `# one of ...` comments. Unnamed groups are numbered in order.
 */
export function parseGroupDeclarations(scriptText: string): Map<string, Grouping> {
  const groups = new Map<string, Grouping>();
  for (const [name, entry] of collectGroupDeclarations(scriptText)) {
    groups.set(name, entry.grouping);
  }
  return groups;
}

function sameGrouping(a: Grouping, b: Grouping): boolean {
  return a.kind === b.kind && a.name === b.name;
}

/**
 * Parse argument annotations and merge group declarations into them.
 * A variable named only by a group declaration gets a plain string
 * annotation with empty help.
 */
export function parseAnnotations(scriptText: string): Map<string, ArgumentAnnotation> {
  const declared = collectGroupDeclarations(scriptText);
  const annotations = new Map<string, ArgumentAnnotation>();

  for (const [i, text] of splitLines(scriptText).lines.entries()) {
    const raw = readAnnotationLine(text);
    if (!raw) continue;
    const name = raw.name.toUpperCase();
    if (RESERVED_NAMES.has(name)) continue;
    annotations.set(name, buildAnnotation(raw, i + 1));
  }

  for (const [name, { grouping, line }] of declared) {
    const existing = annotations.get(name);
    if (!existing) {
      annotations.set(name, { kind: 'str', help: '', grouping });
      continue;
    }
    if (existing.grouping && !sameGrouping(existing.grouping, grouping)) {
      throw new ScriptError(
        'group-conflict',
        `${name} is annotated with ${existing.grouping.kind} '${existing.grouping.name}' but declared in ${grouping.kind} '${grouping.name}'`,
        line
      );
    }
    annotations.set(name, { ...existing, grouping });
  }

  return annotations;
}

/**
 * Text of the first `# Description: ...` comment
 */
export function parseScriptDescription(scriptText: string): string | null {
  for (const text of splitLines(scriptText).lines) {
    const match = DESCRIPTION.exec(text.trim());
    const description = match?.[1]?.trim();
    if (description) return description;
  }
  return null;
}
