/**
 * Script options generated from analysis
 *
 * Undefined variables become required options, environment-backed ones
 * optional with the environment value as default. Annotations add types,
 * help, defaults, aliases and groups. Positional references become
 * ARG1..ARGn; $@ or $* collect whatever follows.
 */

import { validateValue } from '../script/argument-types.js';
import type {
  ArgumentAnnotation,
  Grouping,
  ScriptAnalysis,
} from '../script/types.js';
import { UsageError } from '../types/errors.js';

/**
 * One generated `--name` option
 */
export interface OptionSpec {
  /** Shell variable the value is assigned to */
  variable: string;
  /** Option name without dashes */
  flag: string;
  alias?: string;
  help: string;
  default?: string;
  required: boolean;
  grouping?: Grouping;
  annotation: ArgumentAnnotation;
}

/**
 * The generated command line of a script
 */
export interface ArgumentSpec {
  scriptName: string;
  description: string | null;
  /** Sorted by variable name */
  options: OptionSpec[];
  /** Number of ARGn positionals (highest index referenced) */
  positionalCount: number;
  varargs: boolean;
}

/**
 * Values given on the command line, or a request for help
 */
export type ScriptArgs =
  | { help: true }
  | {
      help: false;
      /** Variable -> value, for every option that has one */
      values: Map<string, string>;
      /** ARG1..ARGn followed by any varargs */
      positionals: string[];
    };

/**
 * Build the option list for a script
 */
export function buildArgumentSpec(
  scriptName: string,
  analysis: ScriptAnalysis
): ArgumentSpec {
  const { classification, annotations, positionals } = analysis;
  const candidates = new Map<string, string | undefined>();
  for (const name of classification.undefined) {
    candidates.set(name, undefined);
  }
  for (const [name, value] of classification.environmentBacked) {
    candidates.set(name, value);
  }

  const options = [...candidates.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([variable, envValue]): OptionSpec => {
      const annotation: ArgumentAnnotation = annotations.get(
        variable.toUpperCase()
      ) ?? { kind: 'str', help: '' };
      const fallback = annotation.default ?? envValue;

      const spec: OptionSpec = {
        variable,
        flag: variable.toLowerCase(),
        help: annotation.help,
        required:
          fallback === undefined &&
          annotation.kind !== 'bool' &&
          annotation.grouping?.kind !== 'exclusive',
        annotation,
      };
      if (fallback !== undefined) spec.default = fallback;
      if (annotation.alias) spec.alias = annotation.alias;
      if (annotation.grouping) spec.grouping = annotation.grouping;
      return spec;
    });

  const indices = [...positionals.indices];
  return {
    scriptName,
    description: analysis.description,
    options,
    positionalCount: indices.length > 0 ? Math.max(...indices) : 0,
    varargs: positionals.varargs,
  };
}

function findOption(spec: ArgumentSpec, token: string): OptionSpec | undefined {
  if (token.startsWith('--')) {
    const flag = token.slice(2);
    return spec.options.find((option) => option.flag === flag);
  }
  return spec.options.find((option) => option.alias === token);
}

function displayName(option: OptionSpec): string {
  return option.alias ? `${option.alias}/--${option.flag}` : `--${option.flag}`;
}

/**
 * Parse a script's command-line arguments against its generated spec
 *
 * @throws UsageError for unknown options, missing or invalid values,
 * exclusive-group violations and unexpected positionals
 */
export function parseScriptArgs(spec: ArgumentSpec, argv: string[]): ScriptArgs {
  const given = new Map<string, string>();
  const seen: OptionSpec[] = [];
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';

    if (token === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (token === '--help' || token === '-h') {
      return { help: true };
    }
    if (!token.startsWith('-') || token === '-') {
      positionals.push(token);
      continue;
    }

    const eq = token.indexOf('=');
    const key = token.startsWith('--') && eq !== -1 ? token.slice(0, eq) : token;
    const inline = key === token ? undefined : token.slice(eq + 1);
    const option = findOption(spec, key);
    if (!option) {
      throw new UsageError(`unrecognized arguments: ${token}`);
    }

    let raw: string;
    if (option.annotation.kind === 'bool') {
      raw = inline ?? 'true';
    } else if (inline !== undefined) {
      raw = inline;
    } else {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new UsageError(`argument ${displayName(option)}: expected one argument`);
      }
      raw = next;
      i++;
    }

    given.set(option.variable, validateValue(option.flag, raw, option.annotation));
    if (!seen.includes(option)) seen.push(option);
  }

  checkExclusiveGroups(seen);

  const missing = spec.options.filter(
    (option) => option.required && !given.has(option.variable)
  );
  const missingPositionals: string[] = [];
  for (let n = positionals.length + 1; n <= spec.positionalCount; n++) {
    missingPositionals.push(`ARG${n}`);
  }
  if (missing.length > 0 || missingPositionals.length > 0) {
    const names = [
      ...missing.map((option) => `--${option.flag}`),
      ...missingPositionals,
    ];
    throw new UsageError(
      `the following arguments are required: ${names.join(', ')}`
    );
  }

  if (!spec.varargs && positionals.length > spec.positionalCount) {
    throw new UsageError(
      `unrecognized arguments: ${positionals.slice(spec.positionalCount).join(' ')}`
    );
  }

  const values = new Map<string, string>();
  for (const option of spec.options) {
    const value = given.get(option.variable) ?? defaultValue(option);
    if (value !== undefined) values.set(option.variable, value);
  }

  return { help: false, values, positionals };
}

function defaultValue(option: OptionSpec): string | undefined {
  if (option.default !== undefined) {
    return validateValue(option.flag, option.default, option.annotation);
  }
  return option.annotation.kind === 'bool' ? 'false' : undefined;
}

function checkExclusiveGroups(seen: OptionSpec[]): void {
  const byGroup = new Map<string, OptionSpec>();
  for (const option of seen) {
    if (option.grouping?.kind !== 'exclusive') continue;
    const other = byGroup.get(option.grouping.name);
    if (other) {
      throw new UsageError(
        `argument ${displayName(option)}: not allowed with argument ${displayName(other)}`
      );
    }
    byGroup.set(option.grouping.name, option);
  }
}

function optionSignature(option: OptionSpec): string {
  const long =
    option.annotation.kind === 'bool'
      ? `--${option.flag}`
      : `--${option.flag} ${option.variable.toUpperCase()}`;
  return option.alias ? `${option.alias}, ${long}` : long;
}

function optionHelp(option: OptionSpec): string {
  const parts: string[] = [];
  if (option.help) parts.push(option.help);
  if (option.annotation.kind === 'choice') {
    parts.push(`{${option.annotation.choices.join(',')}}`);
  }
  if (option.default !== undefined) parts.push(`(default: ${option.default})`);
  return parts.join(' ');
}

function formatRow(left: string, right: string): string {
  const padded = left.padEnd(24);
  return right ? `  ${padded} ${right}`.trimEnd() : `  ${left}`;
}

/**
 * Help text for a script's generated options
 */
export function formatHelp(spec: ArgumentSpec): string {
  const usage = [`usage: ${spec.scriptName}`, '[-h]'];
  for (const option of spec.options) {
    const word = optionSignature(option).split(', ').pop() ?? '';
    usage.push(option.required ? word : `[${word}]`);
  }
  for (let n = 1; n <= spec.positionalCount; n++) {
    usage.push(`ARG${n}`);
  }
  if (spec.varargs) usage.push('[ARGS ...]');

  const lines: string[] = [usage.join(' ')];
  if (spec.description) {
    lines.push('', spec.description);
  }

  if (spec.positionalCount > 0 || spec.varargs) {
    lines.push('', 'positional arguments:');
    for (let n = 1; n <= spec.positionalCount; n++) {
      lines.push(formatRow(`ARG${n}`, ''));
    }
    if (spec.varargs) lines.push(formatRow('ARGS', 'additional arguments'));
  }

  lines.push('', 'options:');
  lines.push(formatRow('-h, --help', 'show this help message and exit'));
  const sections = new Map<string, OptionSpec[]>();
  for (const option of spec.options) {
    if (!option.grouping) {
      lines.push(formatRow(optionSignature(option), optionHelp(option)));
      continue;
    }
    const title =
      option.grouping.kind === 'exclusive'
        ? `${option.grouping.name} (only one of):`
        : `${option.grouping.name}:`;
    sections.set(title, [...(sections.get(title) ?? []), option]);
  }

  for (const [title, members] of sections) {
    lines.push('', title);
    for (const option of members) {
      lines.push(formatRow(optionSignature(option), optionHelp(option)));
    }
  }

  return lines.join('\n');
}
