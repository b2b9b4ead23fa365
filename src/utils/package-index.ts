import * as yaml from 'js-yaml';
import type { PackageMetadata } from '../core/metadata/types.js';
import { normalizeDependency, type DependencySpec } from '../core/dependency-resolver/dependency-spec.js';
import { ConstraintParseError, ValidationError } from './errors.js';
import { readTextFile } from './fs.js';

/**
 * Package index files (YAML or JSON):
 *
 *   packages:
 *     - name: web
 *       version: "1.2.0"
 *       dependencies:
 *         - http
 *         - name: tls
 *           version_req: ">=1.1.0"
 *           optional: true
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Version fields must be strings. An unquoted YAML version such as
 * `version: 1.10` arrives as the number 1.1, so numbers are rejected.
 */
function readVersionField(value: unknown, where: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') {
    throw new ValidationError(`${where} must be a quoted string, got the number ${value}`);
  }
  throw new ValidationError(`${where} must be a string`);
}

function readDependency(raw: unknown, where: string): DependencySpec {
  if (typeof raw === 'string') {
    return raw;
  }
  const name = isRecord(raw) ? raw.name : undefined;
  if (!isRecord(raw) || typeof name !== 'string') {
    throw new ValidationError(`${where}: dependency must be a name or a mapping with a name`);
  }
  const optional = raw.optional;
  if (optional !== undefined && typeof optional !== 'boolean') {
    throw new ValidationError(`${where}: dependency '${name}' has a non-boolean optional flag`);
  }
  return {
    name,
    version_req: readVersionField(raw.version_req, `${where}: version_req of '${name}'`),
    version: readVersionField(raw.version, `${where}: version of '${name}'`),
    optional
  };
}

function readEntry(raw: unknown, where: string): PackageMetadata {
  if (!isRecord(raw)) {
    throw new ValidationError(`${where}: entry must be a mapping`);
  }

  const { name: rawName, description } = raw;
  const name = typeof rawName === 'string' ? rawName.trim() : '';
  if (!name) {
    throw new ValidationError(`${where}: entry must contain a name field`);
  }

  const version = readVersionField(raw.version, `${where}: version of '${name}'`)?.trim();
  if (!version) {
    throw new ValidationError(`${where}: package '${name}' must contain a version field`);
  }

  const rawDependencies = raw.dependencies ?? [];
  if (!Array.isArray(rawDependencies)) {
    throw new ValidationError(`${where}: dependencies of '${name}' must be a list`);
  }

  const dependencies = rawDependencies.map((dep: unknown, index: number) => {
    const spec = readDependency(dep, `${where} dependency ${index}`);
    try {
      return normalizeDependency(spec);
    } catch (error) {
      if (error instanceof ConstraintParseError) {
        throw new ValidationError(`${where}: package '${name}': ${error.message}`, { package: name });
      }
      throw error;
    }
  });

  const metadata: PackageMetadata = { name, version, dependencies };
  if (typeof description === 'string') {
    metadata.description = description;
  }
  return metadata;
}

/**
 * Parse index content. `source` names the file in error messages.
 */
export function parsePackageIndex(content: string, source: string = 'package index'): PackageMetadata[] {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ValidationError(`${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (parsed === undefined || parsed === null) {
    return [];
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`${source}: expected a mapping with a packages list`);
  }

  const packages = parsed.packages ?? [];
  if (!Array.isArray(packages)) {
    throw new ValidationError(`${source}: packages must be a list`);
  }

  return packages.map((entry: unknown, index: number) => readEntry(entry, `${source} entry ${index}`));
}

/**
 * Read and parse an index file
 */
export async function loadPackageIndex(path: string): Promise<PackageMetadata[]> {
  const content = await readTextFile(path);
  return parsePackageIndex(content, path);
}
