/**
 * Version conflict detection between packages that require the same dependency.
 *
 * Only pairs of requirements that can never hold together are reported.
 * Anything that cannot be read counts as compatible.
 */

import type { DependencyGraph } from './graph.js';
import type { ConflictDetail, PackageConflict } from './types.js';
import { compareVersions, parseVersion, type ParsedVersion } from './version-constraint.js';
import { ConstraintParseError } from '../../utils/errors.js';

type RequirementOperator = '==' | '>=' | '<=' | '>' | '<' | '!=';

const REQUIREMENT_OPERATORS: readonly RequirementOperator[] = ['==', '>=', '<=', '>', '<', '!='];

export type CompatibilityResult =
  | { success: true; compatible: boolean }
  | { success: false; error: ConstraintParseError };

interface Requirement {
  requiringPackage: string;
  requiredVersion: string;
}

interface PairwiseConflict {
  first: Requirement;
  second: Requirement;
  description: string;
}

function splitOperator(requirement: string): { operator: RequirementOperator; version: string } | null {
  const operator = REQUIREMENT_OPERATORS.find(op => requirement.startsWith(op));
  if (!operator) {
    return null;
  }
  return { operator, version: requirement.slice(operator.length).trim() };
}

function readVersion(requirement: string, text: string): ParsedVersion | ConstraintParseError {
  return parseVersion(text) ?? new ConstraintParseError(requirement, `cannot compare version '${text}'`);
}

/**
 * Decide whether two requirements can both be satisfied.
 * Returns an error result when a version cannot be read; the caller picks the policy.
 */
export function compareRequirements(a: string, b: string): CompatibilityResult {
  const left = splitOperator(a.trim());
  const right = splitOperator(b.trim());

  if (!left || !right) {
    return { success: true, compatible: true };
  }

  const v1 = readVersion(a, left.version);
  if (v1 instanceof ConstraintParseError) {
    return { success: false, error: v1 };
  }
  const v2 = readVersion(b, right.version);
  if (v2 instanceof ConstraintParseError) {
    return { success: false, error: v2 };
  }

  const cmp = compareVersions(v1, v2);
  const ops = `${left.operator} ${right.operator}`;

  switch (ops) {
    case '== ==':
      return { success: true, compatible: cmp === 0 && (v1.prerelease ?? '') === (v2.prerelease ?? '') };
    case '>= <=':
      return { success: true, compatible: cmp <= 0 };
    case '<= >=':
      return { success: true, compatible: cmp >= 0 };
    case '> <':
      return { success: true, compatible: cmp < 0 };
    case '< >':
      return { success: true, compatible: cmp > 0 };
    default:
      return { success: true, compatible: true };
  }
}

/**
 * Lenient policy: requirements that cannot be compared never conflict.
 */
export function areRequirementsCompatible(a: string, b: string): boolean {
  const result = compareRequirements(a, b);
  return result.success ? result.compatible : true;
}

function collectRequirements(graph: DependencyGraph, packageName: string): Requirement[] {
  const requirements: Requirement[] = [];
  const seen = new Set<string>();

  for (const edge of graph.getDependents(packageName)) {
    if (!edge.constraint) continue;
    const key = `${edge.source.name}\u0000${edge.constraint}`;
    if (seen.has(key)) continue;
    seen.add(key);
    requirements.push({ requiringPackage: edge.source.name, requiredVersion: edge.constraint });
  }

  return requirements;
}

/**
 * Find packages whose incoming requirements cannot all hold.
 * For each package the conflict list holds the first side of every
 * conflicting pair followed by the second side of every pair.
 */
export function checkVersionConflicts(graph: DependencyGraph): PackageConflict[] {
  const conflicts: PackageConflict[] = [];

  for (const packageName of graph.nodeNames()) {
    const requirements = collectRequirements(graph, packageName);
    if (requirements.length <= 1) {
      continue;
    }

    const pairs: PairwiseConflict[] = [];
    for (let i = 0; i < requirements.length; i++) {
      for (let j = i + 1; j < requirements.length; j++) {
        const first = requirements[i];
        const second = requirements[j];
        if (!areRequirementsCompatible(first.requiredVersion, second.requiredVersion)) {
          pairs.push({
            first,
            second,
            description: `Incompatible requirements: ${first.requiredVersion} vs ${second.requiredVersion}`
          });
        }
      }
    }

    if (pairs.length === 0) {
      continue;
    }

    const details: ConflictDetail[] = [
      ...pairs.map(pair => ({ ...pair.first, description: pair.description })),
      ...pairs.map(pair => ({ ...pair.second, description: pair.description }))
    ];
    conflicts.push({ packageName, conflicts: details });
  }

  return conflicts;
}
