/**
 * Dependency declarations as they appear in package metadata, and their
 * normalization into a single canonical record.
 */

import { parseConstraint, parseVersion } from './version-constraint.js';
import { ConstraintParseError } from '../../utils/errors.js';

/**
 * Canonical dependency record consumed by the graph builder.
 */
export interface Dependency {
  name: string;
  /** Version requirement, e.g. ">=1.0.0" or "^2.1.0" */
  versionReq?: string;
  /** Minimum version; used as ">=version" when no requirement is given */
  version?: string;
  optional: boolean;
}

/**
 * Structured declaration as written in an index file or metadata payload.
 */
export interface DependencyInput {
  name: string;
  version_req?: string | null;
  version?: string | null;
  optional?: boolean;
}

/** A bare package name, or a structured declaration */
export type DependencySpec = string | DependencyInput;

/**
 * Normalize any declaration shape into a Dependency.
 * Requirement and version strings are validated here; malformed ones throw.
 */
export function normalizeDependency(spec: DependencySpec): Dependency {
  if (typeof spec === 'string') {
    return { name: spec.trim(), optional: false };
  }

  const dependency: Dependency = {
    name: spec.name.trim(),
    optional: spec.optional === true
  };

  const versionReq = spec.version_req?.trim();
  if (versionReq) {
    parseConstraint(versionReq);
    dependency.versionReq = versionReq;
  }

  const version = spec.version?.trim();
  if (version) {
    if (!parseVersion(version)) {
      throw new ConstraintParseError(version, `dependency '${dependency.name}' has an invalid version`);
    }
    dependency.version = version;
  }

  return dependency;
}

/**
 * Requirement recorded on the graph edge for a dependency.
 */
export function effectiveConstraint(dependency: Dependency): string | undefined {
  if (dependency.versionReq) {
    return dependency.versionReq;
  }
  if (dependency.version) {
    return `>=${dependency.version}`;
  }
  return undefined;
}
