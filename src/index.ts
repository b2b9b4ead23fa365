#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { CLI_NAME, CLI_VERSION } from './constants/index.js';

import { setupReportCommand } from './commands/report.js';
import { setupOrderCommand } from './commands/order.js';
import { setupCheckCommand } from './commands/check.js';

/**
 * depsolve CLI - Main entry point
 *
 * Resolves package dependencies from local repository indexes.
 */

export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Resolve package dependencies, installation order and version conflicts')
    .version(CLI_VERSION)
    .option('--cwd <dir>', 'set working directory')
    .option('--verbose', 'log debug output to stderr')
    .configureHelp({ sortSubcommands: true });

  setupReportCommand(program);
  setupOrderCommand(program);
  setupCheckCommand(program);

  program.hook('preAction', async () => {
    const opts = program.opts();

    if (opts.verbose === true) {
      logger.setLevel(LogLevel.DEBUG);
    }

    if (typeof opts.cwd === 'string') {
      const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
      try {
        const stats = await fs.stat(resolvedCwd);
        if (!stats.isDirectory()) {
          throw new Error(`'${opts.cwd}' is not a directory`);
        }
        logger.info(`Working directory will be: ${resolvedCwd}`);
      } catch (err) {
        const errMsg = err instanceof Error ? err.message : String(err);
        logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
        console.error(`❌ Invalid --cwd '${opts.cwd}': ${errMsg}`);
        process.exit(1);
      }
    } else {
      logger.debug(`Working directory: ${process.cwd()}`);
    }
  });

  return program;
}

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith(CLI_NAME)
  )) {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', { reason });
    console.error('❌ An unexpected error occurred. Run with DEPSOLVE_VERBOSE=1 for details.');
    process.exit(1);
  });

  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}
