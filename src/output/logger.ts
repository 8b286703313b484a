/**
 * JSON-lines run log, with ANSI codes stripped from script output
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

/**
 * Tool event for structured logging
 */
export interface ToolEvent {
  type: 'shellflags';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<ToolEvent, 'type' | 'timestamp'>): void;
  close(): void;
  filePath: string | null;
}

/**
 * Create a logger that writes JSON lines to a timestamped log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  scriptName: string
): Logger {
  if (!enabled) {
    return {
      log: () => undefined,
      logEvent: () => undefined,
      close: () => undefined,
      filePath: null,
    };
  }

  // Ensure log directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const sanitizedName = path.basename(scriptName, path.extname(scriptName));
  const logFile = path.join(logDir, `${sanitizedName}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  const write = (eventData: Omit<ToolEvent, 'type' | 'timestamp'>): void => {
    const fullEvent = {
      type: 'shellflags' as const,
      timestamp: new Date().toISOString(),
      ...eventData,
    };
    logStream.write(JSON.stringify(fullEvent) + '\n');
  };

  return {
    log(msg: string): void {
      write({ event: 'message', message: stripAnsi(msg) });
    },
    logEvent: write,
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}
