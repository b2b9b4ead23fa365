/**
 * Live package metadata from a prioritized set of repositories.
 */

import semver from 'semver';
import type { MetadataSource, PackageMetadata } from './types.js';
import { ValidationError } from '../../utils/errors.js';

const DEFAULT_PRIORITY = 50;

export interface RepositoryOptions {
  /** 0-100, higher is consulted first */
  priority?: number;
  enabled?: boolean;
}

export interface RepositorySummary {
  name: string;
  priority: number;
  enabled: boolean;
  packageCount: number;
}

interface Repository {
  name: string;
  priority: number;
  enabled: boolean;
  packages: Map<string, PackageMetadata[]>;
}

/**
 * Sort key that tolerates loose versions such as "1.2" or "2".
 */
function semverKey(version: string): string {
  return semver.valid(version) ?? semver.coerce(version)?.version ?? '0.0.0';
}

function highestVersion(candidates: PackageMetadata[]): PackageMetadata | undefined {
  let best: PackageMetadata | undefined;
  for (const candidate of candidates) {
    if (!best || semver.gt(semverKey(candidate.version), semverKey(best.version))) {
      best = candidate;
    }
  }
  return best;
}

export class RepositorySet implements MetadataSource {
  readonly name = 'repositories';
  private readonly repositories: Repository[] = [];

  /**
   * Register a repository. Several versions of a package may be listed.
   */
  addRepository(name: string, packages: PackageMetadata[], options: RepositoryOptions = {}): void {
    if (this.repositories.some(repo => repo.name === name)) {
      throw new ValidationError(`Repository '${name}' is already registered`, { name });
    }

    const priority = options.priority ?? DEFAULT_PRIORITY;
    if (!Number.isInteger(priority) || priority < 0 || priority > 100) {
      throw new ValidationError(`Repository '${name}' priority must be an integer between 0 and 100`, { name, priority });
    }

    const index = new Map<string, PackageMetadata[]>();
    for (const pkg of packages) {
      const versions = index.get(pkg.name) ?? [];
      versions.push({ ...pkg, repository: pkg.repository ?? name });
      index.set(pkg.name, versions);
    }

    this.repositories.push({ name, priority, enabled: options.enabled ?? true, packages: index });
  }

  setEnabled(name: string, enabled: boolean): boolean {
    const repo = this.repositories.find(r => r.name === name);
    if (!repo) {
      return false;
    }
    repo.enabled = enabled;
    return true;
  }

  listRepositories(): RepositorySummary[] {
    return this.ordered().map(repo => ({
      name: repo.name,
      priority: repo.priority,
      enabled: repo.enabled,
      packageCount: repo.packages.size
    }));
  }

  /**
   * Highest version of the package in the first enabled repository that has it.
   */
  lookup(packageName: string): PackageMetadata | undefined {
    for (const repo of this.ordered()) {
      if (!repo.enabled) continue;
      const candidates = repo.packages.get(packageName);
      if (candidates && candidates.length > 0) {
        return highestVersion(candidates);
      }
    }
    return undefined;
  }

  /** Priority descending; registration order breaks ties */
  private ordered(): Repository[] {
    return this.repositories
      .map((repo, index) => ({ repo, index }))
      .sort((a, b) => b.repo.priority - a.repo.priority || a.index - b.index)
      .map(entry => entry.repo);
  }
}
