#!/usr/bin/env node
/**
 * shellflags - turns a shell script's variables and comments into a
 * command-line interface, then runs, compiles or exports it
 */

import { parseArgs } from './cli/args.js';
import { runScript } from './core/runner.js';
import { printDetail, printError } from './output/colors.js';
import { createLogger } from './output/logger.js';
import { loadScript } from './script/index.js';
import { DEFAULT_CONFIG, type ToolConfig } from './types/config.js';
import { UsageError } from './types/errors.js';
import { EXIT_FAILURE, EXIT_USAGE } from './utils/constants.js';

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  // Merge config with defaults
  const config: ToolConfig = {
    ...DEFAULT_CONFIG,
    ...parsed.config,
  };

  const logger = createLogger(config.enableLog, config.logDir, parsed.scriptFile);
  if (logger.filePath && config.verbosity === 'verbose') {
    printDetail(`Log: ${logger.filePath}`);
  }
  logger.logEvent({
    event: 'start',
    subcommand: parsed.subcommand,
    script: parsed.scriptFile,
  });

  try {
    return await runScript(
      {
        subcommand: parsed.subcommand,
        scriptFile: parsed.scriptFile,
        scriptText: loadScript(parsed.scriptFile),
        scriptArgs: parsed.scriptArgs,
      },
      { config, logger, cwd: process.cwd(), env: process.env }
    );
  } catch (err: unknown) {
    logger.logEvent({
      event: 'error',
      message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  } finally {
    logger.close();
  }
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    printError(message);
    if (err instanceof UsageError) {
      console.error(`Run 'shellflags <script> --help' for the script's options`);
      process.exit(EXIT_USAGE);
    }
    process.exit(EXIT_FAILURE);
  });
