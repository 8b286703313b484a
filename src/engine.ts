/**
 * Library entry point: script analysis and macro expansion
 */

export {
  analyzeScript,
  classifyVariables,
  detectShell,
  parseAnnotations,
  parseGroupDeclarations,
  parsePositionalUsages,
  parseScriptDescription,
  validateValue,
} from './script/index.js';
export type {
  ArgumentAnnotation,
  ArgumentKind,
  Environment,
  Grouping,
  PositionalUsage,
  ScriptAnalysis,
  VariableClassification,
} from './script/index.js';

export {
  expandMacros,
  findFunctionEnd,
  findFunctions,
  findMacroComments,
  findTargetForMacro,
  listMacros,
  parseIterationMacro,
  parseSafetyMacro,
} from './macros/index.js';
export type {
  ExpansionOptions,
  FunctionBlock,
  FunctionBoundary,
  IterationMacro,
  MacroComment,
  MacroTarget,
  SafetyMacro,
} from './macros/index.js';

export {
  buildArgumentSpec,
  formatHelp,
  parseScriptArgs,
} from './cli/dynamic.js';
export type { ArgumentSpec, OptionSpec, ScriptArgs } from './cli/dynamic.js';

export {
  generateExportLines,
  injectVariableAssignments,
  transformToEchoMode,
} from './compile/inject.js';

export { ScriptError, UsageError } from './types/errors.js';
export type { ScriptRule } from './types/errors.js';
