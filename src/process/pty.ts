/**
 * PTY process management for running compiled scripts
 */

import type { IPty } from 'node-pty';
import * as pty from 'node-pty';

import type { Logger } from '../output/logger.js';
import { PTY_COLS, PTY_ROWS } from '../utils/constants.js';

export interface ShellProcessOptions {
  /** Interpreter path, e.g. /bin/bash */
  shell: string;
  scriptText: string;
  /** Becomes $0 inside the script */
  scriptName: string;
  positionals: string[];
  cwd: string;
  logger: Logger;
}

export interface ShellResult {
  exitCode: number;
  /** Seconds */
  duration: number;
}

/**
 * Run script text as `<shell> -c <text> <name> <positionals...>` in a
 * pseudo-terminal, forwarding its output to stdout and, when stdin is a
 * terminal, keystrokes to the script
 */
export function spawnShell(options: ShellProcessOptions): Promise<ShellResult> {
  const { shell, scriptText, scriptName, positionals, cwd, logger } = options;

  return new Promise((resolve) => {
    const runStart = Date.now();

    const ptyProcess: IPty = pty.spawn(
      shell,
      ['-c', scriptText, scriptName, ...positionals],
      {
        name: 'xterm-256color',
        cols: process.stdout.columns ?? PTY_COLS,
        rows: process.stdout.rows ?? PTY_ROWS,
        cwd,
        env: { ...process.env },
      }
    );

    const stdin = process.stdin;
    const forwardInput = (chunk: Buffer | string): void => {
      ptyProcess.write(chunk.toString());
    };
    const interactive = stdin.isTTY === true;
    if (interactive) {
      stdin.setRawMode(true);
      stdin.on('data', forwardInput);
      stdin.resume();
    }

    ptyProcess.onData((data: string) => {
      process.stdout.write(data);
      logger.log(data);
    });

    ptyProcess.onExit(({ exitCode }) => {
      if (interactive) {
        stdin.off('data', forwardInput);
        stdin.setRawMode(false);
        stdin.pause();
      }
      const duration = Math.round((Date.now() - runStart) / 1000);
      resolve({ exitCode, duration });
    });
  });
}
