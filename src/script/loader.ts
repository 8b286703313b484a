/**
 * Script file loading
 */

import * as fs from 'fs';

import { UsageError } from '../types/errors.js';

/**
 * Read a script file as UTF-8 text
 *
 * @throws UsageError when the file does not exist
 */
export function loadScript(scriptFile: string): string {
  if (!fs.existsSync(scriptFile)) {
    throw new UsageError(`Script not found: ${scriptFile}`);
  }
  return fs.readFileSync(scriptFile, 'utf-8');
}
