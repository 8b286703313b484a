/**
 * Script pipeline: analyze, build options, parse values, expand, compile,
 * then print or run. The stages run in this fixed order.
 */

import * as path from 'path';

import { buildArgumentSpec, formatHelp, parseScriptArgs } from '../cli/dynamic.js';
import {
  generateExportLines,
  injectVariableAssignments,
  transformToEchoMode,
} from '../compile/inject.js';
import { expandMacros, listMacros } from '../macros/index.js';
import { colors, formatDuration, printDetail, printStatus, truncate } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import { spawnShell } from '../process/pty.js';
import { analyzeScript, annotationKinds } from '../script/analyze.js';
import type { ScriptAnalysis } from '../script/types.js';
import type { Environment } from '../script/variables.js';
import type { Subcommand, ToolConfig } from '../types/config.js';
import { formatNameList, formatSize } from '../utils/formatting.js';

export interface RunnerContext {
  config: ToolConfig;
  logger: Logger;
  cwd: string;
  /** Environment snapshot for variable classification */
  env: Environment;
}

export interface ScriptInvocation {
  subcommand: Subcommand;
  scriptFile: string;
  scriptText: string;
  scriptArgs: string[];
}

/**
 * What a prepared invocation produces
 */
export type PipelineOutcome =
  | { kind: 'help'; text: string }
  | { kind: 'exports'; text: string }
  | { kind: 'compiled'; text: string; shell: string; positionals: string[] };

function reportAnalysis(analysis: ScriptAnalysis, scriptText: string): void {
  const { classification, positionals, annotations } = analysis;
  printDetail(`Shell: ${analysis.shell}`);
  printDetail(`Defined: ${formatNameList(classification.defined)}`);
  printDetail(`Undefined: ${formatNameList(classification.undefined)}`);
  printDetail(
    `Environment: ${formatNameList(
      [...classification.environmentBacked].map(
        ([name, value]) => `${name}=${truncate(value, 30)}`
      )
    )}`
  );
  printDetail(
    `Positionals: ${formatNameList([...positionals.indices].map((n) => `$${n}`))}${positionals.varargs ? ' + varargs' : ''}`
  );
  printDetail(
    `Annotations: ${formatNameList(
      [...annotations].map(([name, annotation]) => `${name} (${annotation.kind})`)
    )}`
  );
  for (const macro of listMacros(scriptText)) {
    printDetail(
      `Macro line ${macro.line}: ${macro.type} '${macro.content}' -> ${macro.target} [${macro.detail}]`
    );
  }
}

/**
 * Run every stage short of execution
 *
 * @throws ScriptError for script defects, UsageError for bad script options
 */
export function prepareScript(
  invocation: ScriptInvocation,
  context: RunnerContext
): PipelineOutcome {
  const { config, logger, env } = context;
  const { scriptText } = invocation;
  const scriptName = path.basename(invocation.scriptFile);

  const analysis = analyzeScript(scriptText, env);
  logger.logEvent({
    event: 'analysis',
    undefined: [...analysis.classification.undefined],
    environment: [...analysis.classification.environmentBacked.keys()],
    positionals: [...analysis.positionals.indices],
    varargs: analysis.positionals.varargs,
  });
  if (config.verbosity === 'verbose') {
    reportAnalysis(analysis, scriptText);
  }

  const spec = buildArgumentSpec(scriptName, analysis);
  const args = parseScriptArgs(spec, invocation.scriptArgs);
  if (args.help) {
    return { kind: 'help', text: formatHelp(spec) };
  }

  if (invocation.subcommand === 'export') {
    return { kind: 'exports', text: generateExportLines(args.values) };
  }

  const expanded = expandMacros(scriptText, {
    variableKinds: annotationKinds(analysis),
    maxNestingDepth: config.maxNestingDepth,
  });
  const injected = injectVariableAssignments(expanded, args.values);
  const text = config.echoMode ? transformToEchoMode(injected) : injected;
  logger.logEvent({ event: 'compiled', chars: text.length });
  if (config.verbosity === 'verbose') {
    printDetail(`Compiled: ${formatSize(text.length)}`);
  }

  return {
    kind: 'compiled',
    text,
    shell: analysis.shell,
    positionals: args.positionals,
  };
}

function writeOut(text: string): void {
  if (text === '') return;
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

/**
 * Carry out an invocation and return the process exit code
 */
export async function runScript(
  invocation: ScriptInvocation,
  context: RunnerContext
): Promise<number> {
  const { config, logger, cwd } = context;
  const outcome = prepareScript(invocation, context);

  if (outcome.kind !== 'compiled' || invocation.subcommand === 'compile') {
    writeOut(outcome.text);
    return 0;
  }

  const scriptName = path.basename(invocation.scriptFile);
  if (config.verbosity !== 'quiet') {
    printStatus(`Running ${scriptName} with ${outcome.shell}`);
  }
  logger.logEvent({ event: 'run_start', shell: outcome.shell });

  const startTime = Date.now();
  const { exitCode } = await spawnShell({
    shell: outcome.shell,
    scriptText: outcome.text,
    scriptName: invocation.scriptFile,
    positionals: outcome.positionals,
    cwd,
    logger,
  });

  const elapsed = formatDuration(Date.now() - startTime);
  logger.logEvent({ event: 'run_end', exitCode });
  if (exitCode !== 0) {
    printStatus(`${colors.red}Failed${colors.reset} ${scriptName} exit=${exitCode} in ${elapsed}`);
  } else if (config.verbosity !== 'quiet') {
    printStatus(`${colors.green}Finished${colors.reset} ${scriptName} in ${elapsed}`);
  }
  return exitCode;
}
