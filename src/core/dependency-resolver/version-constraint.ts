/**
 * Version requirement parsing and evaluation.
 *
 * Supported forms:
 * - "latest"          any version
 * - "1.2.3"           exact match
 * - "=1.2.3", "==1.2.3"
 * - ">1.2.3", ">=1.2.3", "<1.2.3", "<=1.2.3"
 * - "^1.2.3"          same major (same minor below 1.0.0, exact below 0.1.0)
 * - "~1.2.3"          same major and minor
 * - "1.2.3 - 2.3.4"   inclusive range
 *
 * Versions carry one to three numeric components and an optional
 * "-prerelease" suffix. Missing components compare as 0.
 */

import { ConstraintParseError } from '../../utils/errors.js';

export type ConstraintOperator = '==' | '=' | '>=' | '<=' | '>' | '<' | '^' | '~';

/** Longest operators first so ">=" is not read as ">" */
const OPERATORS: readonly ConstraintOperator[] = ['>=', '<=', '==', '>', '<', '=', '^', '~'];

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z][0-9A-Za-z.-]*))?$/;

const RANGE_SEPARATOR = ' - ';

export interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
  prerelease?: string;
  raw: string;
}

export type VersionConstraint =
  | { kind: 'latest'; raw: string }
  | { kind: 'exact'; version: ParsedVersion; raw: string }
  | { kind: 'range'; min: ParsedVersion; max: ParsedVersion; raw: string }
  | { kind: 'comparison'; operator: ConstraintOperator; version: ParsedVersion; raw: string };

export type ConstraintParseResult =
  | { success: true; constraint: VersionConstraint }
  | { success: false; error: ConstraintParseError };

export type CompareResult = -1 | 0 | 1;

/**
 * Parse a dotted version, or return null when it is not one.
 */
export function parseVersion(text: string): ParsedVersion | null {
  const raw = text.trim();
  const match = VERSION_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const [, major, minor, patch, prerelease] = match;
  return {
    major: Number(major),
    minor: minor === undefined ? 0 : Number(minor),
    patch: patch === undefined ? 0 : Number(patch),
    prerelease: prerelease || undefined,
    raw
  };
}

/**
 * Numeric component-wise comparison. Pre-release tags do not take part.
 */
export function compareVersions(a: ParsedVersion, b: ParsedVersion): CompareResult {
  const left = [a.major, a.minor, a.patch];
  const right = [b.major, b.minor, b.patch];
  for (let i = 0; i < left.length; i++) {
    if (left[i] < right[i]) return -1;
    if (left[i] > right[i]) return 1;
  }
  return 0;
}

function versionsEqual(a: ParsedVersion, b: ParsedVersion): boolean {
  return compareVersions(a, b) === 0 && (a.prerelease ?? '') === (b.prerelease ?? '');
}

function requireVersion(constraint: string, text: string): ParsedVersion {
  const version = parseVersion(text);
  if (!version) {
    throw new ConstraintParseError(constraint, `'${text.trim()}' is not a version of 1-3 numeric components`);
  }
  return version;
}

/**
 * Parse a version requirement. Throws ConstraintParseError on malformed input.
 */
export function parseConstraint(spec: string): VersionConstraint {
  const raw = spec.trim();
  if (!raw) {
    throw new ConstraintParseError(spec, 'constraint is empty');
  }

  if (raw === 'latest') {
    return { kind: 'latest', raw };
  }

  if (raw.includes(RANGE_SEPARATOR)) {
    const parts = raw.split(RANGE_SEPARATOR);
    if (parts.length !== 2) {
      throw new ConstraintParseError(spec, `a range needs exactly two versions separated by '${RANGE_SEPARATOR}'`);
    }
    return {
      kind: 'range',
      min: requireVersion(spec, parts[0]),
      max: requireVersion(spec, parts[1]),
      raw
    };
  }

  const operator = OPERATORS.find(op => raw.startsWith(op));
  if (operator) {
    return {
      kind: 'comparison',
      operator,
      version: requireVersion(spec, raw.slice(operator.length)),
      raw
    };
  }

  if (!/^\d/.test(raw)) {
    throw new ConstraintParseError(spec, 'unrecognized operator');
  }

  return { kind: 'exact', version: requireVersion(spec, raw), raw };
}

/**
 * Parse without throwing, for call sites that decide their own policy on bad input.
 */
export function tryParseConstraint(spec: string): ConstraintParseResult {
  try {
    return { success: true, constraint: parseConstraint(spec) };
  } catch (error) {
    if (error instanceof ConstraintParseError) {
      return { success: false, error };
    }
    throw error;
  }
}

function satisfiesComparison(
  operator: ConstraintOperator,
  required: ParsedVersion,
  actual: ParsedVersion
): boolean {
  const cmp = compareVersions(actual, required);
  switch (operator) {
    case '=':
    case '==':
      return versionsEqual(actual, required);
    case '>=':
      return cmp >= 0;
    case '>':
      return cmp > 0;
    case '<=':
      return cmp <= 0;
    case '<':
      return cmp < 0;
    case '^':
      if (required.major > 0) {
        return cmp >= 0 && actual.major === required.major;
      }
      if (required.minor > 0) {
        return cmp >= 0 && actual.major === 0 && actual.minor === required.minor;
      }
      return cmp === 0;
    case '~':
      return cmp >= 0 && actual.major === required.major && actual.minor === required.minor;
  }
}

/**
 * Check whether a concrete version satisfies a requirement.
 * String requirements are parsed strictly first.
 */
export function isSatisfiedBy(constraint: VersionConstraint | string, version: string): boolean {
  const parsed = typeof constraint === 'string' ? parseConstraint(constraint) : constraint;
  if (parsed.kind === 'latest') {
    return true;
  }

  const actual = parseVersion(version);
  if (!actual) {
    return false;
  }

  switch (parsed.kind) {
    case 'exact':
      return versionsEqual(actual, parsed.version);
    case 'range':
      return compareVersions(parsed.min, actual) <= 0 && compareVersions(actual, parsed.max) <= 0;
    case 'comparison':
      return satisfiesComparison(parsed.operator, parsed.version, actual);
  }
}
