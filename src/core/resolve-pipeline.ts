import type { CommandResult } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { loadPackageIndex } from '../utils/package-index.js';
import { loadConfig, type ResolvedConfig } from './config.js';
import { DependencyResolver, type DependencyReport } from './dependency-resolver/index.js';
import { CachingMetadataSource, InstalledPackages, RepositorySet } from './metadata/index.js';

export interface PipelineOptions {
  /** Working directory used to locate the config file */
  cwd: string;
  /** Explicit config file, relative to `cwd` */
  configPath?: string;
}

export interface OrderPipelineOptions extends PipelineOptions {
  /** Fall back to installed packages for names no repository knows */
  includeInstalled?: boolean;
}

export interface OrderPipelineResult {
  installationOrder: string[];
  missing: string[];
  degraded: boolean;
  warnings: string[];
}

/**
 * Load every configured index and build a resolver over them.
 */
export async function createResolver(config: ResolvedConfig): Promise<DependencyResolver> {
  const repositories = new RepositorySet();
  for (const repo of config.repositories) {
    const packages = await loadPackageIndex(repo.index);
    logger.debug(`Loaded ${packages.length} entries from repository '${repo.name}'`, { index: repo.index });
    repositories.addRepository(repo.name, packages, { priority: repo.priority, enabled: repo.enabled });
  }

  const installed = new InstalledPackages(config.installed ? await loadPackageIndex(config.installed) : []);

  return new DependencyResolver({
    live: new CachingMetadataSource(repositories),
    installed: new CachingMetadataSource(installed),
    maxDepth: config.maxDepth
  });
}

function validateRequested(packages: string[]): string[] {
  const requested = packages.map(name => name.trim()).filter(name => name.length > 0);
  if (requested.length === 0) {
    throw new ValidationError('At least one package name is required');
  }
  return requested;
}

/**
 * Full dependency report for the requested packages
 */
export async function runReportPipeline(
  packages: string[],
  options: PipelineOptions
): Promise<CommandResult<DependencyReport>> {
  const requested = validateRequested(packages);
  const config = await loadConfig(options.cwd, options.configPath);
  const resolver = await createResolver(config);

  const report = resolver.generateReport(requested);
  return { success: true, data: report, warnings: report.warnings };
}

/**
 * Installation order and missing packages. `includeInstalled` overrides the
 * config file when given.
 */
export async function runOrderPipeline(
  packages: string[],
  options: OrderPipelineOptions
): Promise<CommandResult<OrderPipelineResult>> {
  const requested = validateRequested(packages);
  const config = await loadConfig(options.cwd, options.configPath);
  const resolver = await createResolver(config);

  const includeInstalled = options.includeInstalled ?? config.includeInstalled;
  const resolution = resolver.resolve(requested, includeInstalled);

  return {
    success: true,
    data: {
      installationOrder: resolution.installationOrder,
      missing: resolution.missing,
      degraded: resolution.degraded,
      warnings: resolution.warnings
    },
    warnings: resolution.warnings
  };
}
