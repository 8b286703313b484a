/**
 * Script analysis: the fixed sequence of read-only passes over a script
 */

import { parseAnnotations, parseScriptDescription } from './annotations.js';
import type { ArgumentKind, ScriptAnalysis } from './types.js';
import {
  type Environment,
  classifyVariables,
  detectShell,
  parsePositionalUsages,
} from './variables.js';

/**
 * Analyze a script for CLI generation
 */
export function analyzeScript(
  scriptText: string,
  env: Environment = process.env
): ScriptAnalysis {
  return {
    classification: classifyVariables(scriptText, env),
    positionals: parsePositionalUsages(scriptText),
    annotations: parseAnnotations(scriptText),
    description: parseScriptDescription(scriptText),
    shell: detectShell(scriptText),
  };
}

/**
 * Annotation kinds by variable name, for iteration kind inference
 */
export function annotationKinds(
  analysis: ScriptAnalysis
): Map<string, ArgumentKind> {
  const kinds = new Map<string, ArgumentKind>();
  for (const [name, annotation] of analysis.annotations) {
    kinds.set(name, annotation.kind);
  }
  return kinds;
}
