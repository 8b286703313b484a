/**
 * Script module - loading and static analysis
 */

// Types
export type {
  AnnotationBase,
  ArgumentAnnotation,
  ArgumentKind,
  BoolAnnotation,
  ChoiceAnnotation,
  FileAnnotation,
  FloatAnnotation,
  Grouping,
  IntAnnotation,
  PositionalUsage,
  ScriptAnalysis,
  StringAnnotation,
  VariableClassification,
} from './types.js';

// Loader
export { loadScript } from './loader.js';

// Analysis
export { analyzeScript, annotationKinds } from './analyze.js';
export {
  parseAnnotations,
  parseGroupDeclarations,
  parseScriptDescription,
} from './annotations.js';
export {
  resolveArgumentKind,
  supportedTypeNames,
  validateValue,
} from './argument-types.js';
export type { Environment } from './variables.js';
export {
  classifyVariables,
  detectShell,
  parseDefinedVariables,
  parsePositionalUsages,
  parseVariableUsages,
} from './variables.js';
