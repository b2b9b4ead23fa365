import { Command } from 'commander';
import type { OrderOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getWorkingDirectory } from '../utils/working-directory.js';
import { runOrderPipeline } from '../core/resolve-pipeline.js';
import { resolveOutput, type OutputPort } from '../core/ports/index.js';

export async function orderCommand(
  packages: string[],
  options: OrderOptions,
  cwd: string,
  output?: OutputPort
): Promise<void> {
  logger.debug('Order command invoked', { packages, options });
  const out = output ?? resolveOutput();

  // commander defaults `installed` to true; only an explicit --no-installed overrides the config
  const result = await runOrderPipeline(packages, {
    cwd,
    configPath: options.config,
    includeInstalled: options.installed === false ? false : undefined
  });
  if (!result.success || !result.data) {
    throw new Error(result.error || 'Order resolution failed');
  }

  const { installationOrder, missing, degraded } = result.data;
  for (const name of installationOrder) {
    out.message(name);
  }
  if (missing.length > 0) {
    out.warn(`Missing packages: ${missing.join(', ')}`);
  }
  if (degraded) {
    out.warn('Installation order is degraded: a dependency cycle could not be broken');
  }
}

/**
 * Setup the order command
 */
export function setupOrderCommand(program: Command): void {
  program
    .command('order')
    .description('Print the installation order, dependencies first')
    .argument('<packages...>', 'packages to resolve')
    .option('--no-installed', 'ignore installed packages when a repository has no entry')
    .option('--config <path>', 'config file (default: depsolve.jsonc or depsolve.json)')
    .action(withErrorHandling(async (packages: string[], options: OrderOptions, command: Command) => {
      await orderCommand(packages, options, getWorkingDirectory(command));
    }));
}
