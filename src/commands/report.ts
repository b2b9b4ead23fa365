import { Command } from 'commander';
import type { ReportOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getWorkingDirectory } from '../utils/working-directory.js';
import { runReportPipeline } from '../core/resolve-pipeline.js';
import { displayDependencyReport, formatReportJson } from '../core/dependency-resolver/index.js';
import { resolveOutput, type OutputPort } from '../core/ports/index.js';

export async function reportCommand(
  packages: string[],
  options: ReportOptions,
  cwd: string,
  output?: OutputPort
): Promise<void> {
  logger.debug('Report command invoked', { packages, options });
  const out = output ?? resolveOutput();

  const result = await runReportPipeline(packages, { cwd, configPath: options.config });
  if (!result.success || !result.data) {
    throw new Error(result.error || 'Report generation failed');
  }

  if (options.json) {
    out.message(formatReportJson(result.data));
    return;
  }
  displayDependencyReport(result.data, out);
}

/**
 * Setup the report command
 */
export function setupReportCommand(program: Command): void {
  program
    .command('report')
    .description('Show the dependency tree, installation order, missing packages and conflicts')
    .argument('<packages...>', 'packages to resolve')
    .option('--json', 'print the report as JSON')
    .option('--config <path>', 'config file (default: depsolve.jsonc or depsolve.json)')
    .action(withErrorHandling(async (packages: string[], options: ReportOptions, command: Command) => {
      await reportCommand(packages, options, getWorkingDirectory(command));
    }));
}
