/**
 * Tool configuration and CLI types
 */

import { DEFAULT_MAX_NESTING_DEPTH } from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export type Subcommand = 'run' | 'compile' | 'export';

/**
 * Tool configuration
 */
export interface ToolConfig {
  verbosity: Verbosity;
  enableLog: boolean;
  logDir: string;
  /** Replace each command line with an echo of itself */
  echoMode: boolean;
  maxNestingDepth: number;
}

/**
 * Default tool configuration
 */
export const DEFAULT_CONFIG: ToolConfig = {
  verbosity: 'normal',
  enableLog: false,
  logDir: 'logs',
  echoMode: false,
  maxNestingDepth: DEFAULT_MAX_NESTING_DEPTH,
};

/**
 * Parsed top-level CLI arguments
 */
export interface ParsedArgs {
  subcommand: Subcommand;
  scriptFile: string;
  /** Everything after the script path, handed to the generated parser */
  scriptArgs: string[];
  config: Partial<ToolConfig>;
}
