/**
 * Types for script analysis results
 */

/**
 * How each referenced variable is satisfied
 */
export interface VariableClassification {
  /** Assigned in the script (assignments, declarations, loop variables) */
  defined: Set<string>;
  /** Referenced as $NAME or ${NAME...}, special parameters excluded */
  used: Set<string>;
  /** Used, not defined, and absent from the environment */
  undefined: Set<string>;
  /** Used, not defined, present in the environment: name -> value */
  environmentBacked: Map<string, string>;
}

/**
 * Positional parameter references ($1, $2, ... and $@ / $*)
 */
export interface PositionalUsage {
  indices: Set<number>;
  varargs: boolean;
}

/**
 * Canonical argument type names
 */
export type ArgumentKind = 'str' | 'int' | 'float' | 'bool' | 'choice' | 'file';

/**
 * Placement of an argument in a help section or a mutually exclusive set
 */
export type Grouping =
  | { kind: 'group'; name: string }
  | { kind: 'exclusive'; name: string };

export interface AnnotationBase {
  help: string;
  default?: string;
  /** Single-dash, single-character flag such as -v */
  alias?: string;
  grouping?: Grouping;
}

export interface StringAnnotation extends AnnotationBase {
  kind: 'str';
}

export interface IntAnnotation extends AnnotationBase {
  kind: 'int';
}

export interface FloatAnnotation extends AnnotationBase {
  kind: 'float';
}

export interface BoolAnnotation extends AnnotationBase {
  kind: 'bool';
}

export interface ChoiceAnnotation extends AnnotationBase {
  kind: 'choice';
  /** Never empty */
  choices: string[];
}

export interface FileAnnotation extends AnnotationBase {
  kind: 'file';
}

/**
 * Argument metadata parsed from comments, keyed by uppercase variable name
 */
export type ArgumentAnnotation =
  | StringAnnotation
  | IntAnnotation
  | FloatAnnotation
  | BoolAnnotation
  | ChoiceAnnotation
  | FileAnnotation;

/**
 * Everything the CLI builder needs to know about a script
 */
export interface ScriptAnalysis {
  classification: VariableClassification;
  positionals: PositionalUsage;
  annotations: Map<string, ArgumentAnnotation>;
  description: string | null;
  /** Interpreter path used to run the script */
  shell: string;
}
