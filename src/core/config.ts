import { dirname, isAbsolute, join, resolve } from 'path';
import type { DepsolveConfig, RepositoryConfig } from '../types/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { MAX_DEPTH_DEFAULT } from './dependency-resolver/resolver.js';

/**
 * Configuration loading for depsolve
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = ['depsolve.jsonc', 'depsolve.json'];

export interface ResolvedRepositoryConfig {
  name: string;
  /** Absolute path to the index file */
  index: string;
  priority: number;
  enabled: boolean;
}

export interface ResolvedConfig {
  maxDepth: number;
  includeInstalled: boolean;
  repositories: ResolvedRepositoryConfig[];
  installed?: string;
  /** File the configuration came from; undefined when defaults are used */
  configPath?: string;
}

const DEFAULT_PRIORITY = 50;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find the config file in a directory, preferring JSONC
 */
export async function findConfigFile(cwd: string): Promise<string | null> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const path = join(cwd, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

function validateRepository(raw: unknown, index: number, configPath: string): RepositoryConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${configPath}: repositories[${index}] must be an object`);
  }
  const { name, index: indexPath, priority, enabled } = raw;
  if (typeof name !== 'string' || !name.trim()) {
    throw new ConfigError(`${configPath}: repositories[${index}].name must be a non-empty string`);
  }
  if (typeof indexPath !== 'string' || !indexPath.trim()) {
    throw new ConfigError(`${configPath}: repository '${name}' needs an index path`);
  }

  const repository: RepositoryConfig = { name: name.trim(), index: indexPath };
  if (priority !== undefined) {
    if (typeof priority !== 'number' || !Number.isInteger(priority) || priority < 0 || priority > 100) {
      throw new ConfigError(`${configPath}: repository '${name}' priority must be an integer between 0 and 100`);
    }
    repository.priority = priority;
  }
  if (enabled !== undefined) {
    if (typeof enabled !== 'boolean') {
      throw new ConfigError(`${configPath}: repository '${name}' enabled must be a boolean`);
    }
    repository.enabled = enabled;
  }
  return repository;
}

/**
 * Check the shape of a parsed config document
 */
export function validateConfig(raw: unknown, configPath: string): DepsolveConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${configPath}: configuration must be an object`);
  }

  const config: DepsolveConfig = {};
  const { maxDepth, includeInstalled, repositories, installed } = raw;

  if (maxDepth !== undefined) {
    if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new ConfigError(`${configPath}: maxDepth must be a non-negative integer`);
    }
    config.maxDepth = maxDepth;
  }

  if (includeInstalled !== undefined) {
    if (typeof includeInstalled !== 'boolean') {
      throw new ConfigError(`${configPath}: includeInstalled must be a boolean`);
    }
    config.includeInstalled = includeInstalled;
  }

  if (repositories !== undefined) {
    if (!Array.isArray(repositories)) {
      throw new ConfigError(`${configPath}: repositories must be an array`);
    }
    config.repositories = repositories.map((repo: unknown, index: number) =>
      validateRepository(repo, index, configPath)
    );
  }

  if (installed !== undefined) {
    if (typeof installed !== 'string' || !installed.trim()) {
      throw new ConfigError(`${configPath}: installed must be a path`);
    }
    config.installed = installed;
  }

  return config;
}

/**
 * Apply defaults and make paths absolute relative to `baseDir`
 */
export function resolveConfig(config: DepsolveConfig, baseDir: string, configPath?: string): ResolvedConfig {
  const toAbsolute = (path: string): string => (isAbsolute(path) ? path : resolve(baseDir, path));

  const names = new Set<string>();
  const repositories = (config.repositories ?? []).map(repo => {
    if (names.has(repo.name)) {
      throw new ConfigError(`Repository '${repo.name}' is configured more than once`);
    }
    names.add(repo.name);
    return {
      name: repo.name,
      index: toAbsolute(repo.index),
      priority: repo.priority ?? DEFAULT_PRIORITY,
      enabled: repo.enabled ?? true
    };
  });

  return {
    maxDepth: config.maxDepth ?? MAX_DEPTH_DEFAULT,
    includeInstalled: config.includeInstalled ?? true,
    repositories,
    installed: config.installed ? toAbsolute(config.installed) : undefined,
    configPath
  };
}

/**
 * Load configuration from an explicit path, or from depsolve.jsonc /
 * depsolve.json in `cwd`. Missing files yield the defaults.
 */
export async function loadConfig(cwd: string, explicitPath?: string): Promise<ResolvedConfig> {
  const configPath = explicitPath ? resolve(cwd, explicitPath) : await findConfigFile(cwd);

  if (!configPath) {
    logger.debug(`No depsolve config found in ${cwd}, using defaults`);
    return resolveConfig({}, cwd);
  }

  if (explicitPath && !(await exists(configPath))) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  logger.debug(`Loading config from: ${configPath}`);
  const raw = await readJsonOrJsoncFile(configPath);
  return resolveConfig(validateConfig(raw, configPath), dirname(configPath), configPath);
}
