/**
 * Dependency resolution core
 *
 * - version-constraint.ts: requirement parsing and evaluation
 * - dependency-spec.ts: declaration shapes and normalization
 * - graph.ts: dependency graph, cycles and ordering
 * - conflict-detector.ts: incompatible requirements between co-requirers
 * - resolver.ts: graph discovery, resolution and report assembly
 * - tree-builder.ts, report.ts, display.ts: report shapes and rendering
 */

export type {
  PackageIdentity,
  DependencyEdge,
  OrderingResult,
  ConflictDetail,
  PackageConflict,
  ResolvedTreeNode,
  CircularTreeNode,
  MissingTreeNode,
  DependencyTreeNode,
  GraphBuildResult,
  Resolution,
  DependencyReport
} from './types.js';

export {
  parseConstraint,
  tryParseConstraint,
  parseVersion,
  compareVersions,
  isSatisfiedBy,
  type VersionConstraint,
  type ConstraintOperator,
  type ParsedVersion
} from './version-constraint.js';

export {
  normalizeDependency,
  effectiveConstraint,
  type Dependency,
  type DependencyInput,
  type DependencySpec
} from './dependency-spec.js';

export { DependencyGraph } from './graph.js';
export { checkVersionConflicts, compareRequirements, areRequirementsCompatible } from './conflict-detector.js';
export { DependencyResolver, MAX_DEPTH_DEFAULT, type ResolverOptions } from './resolver.js';
export { buildDependencyTree, buildDependencyTrees } from './tree-builder.js';
export { serializeReport, serializeTree, formatReportJson, type DependencyReportJson } from './report.js';
export { displayDependencyReport, renderDependencyTree } from './display.js';
