import type { DependencyGraph } from './graph.js';

/**
 * A package node: name plus the version, once known.
 */
export interface PackageIdentity {
  name: string;
  version?: string;
}

/**
 * "source requires target", optionally constrained.
 */
export interface DependencyEdge {
  source: PackageIdentity;
  target: PackageIdentity;
  /** Version requirement, e.g. ">=1.0.0" */
  constraint?: string;
  /** Optional edges may be dropped to break a cycle */
  optional: boolean;
}

/**
 * Outcome of ordering a graph.
 * When `degraded` is true the order is sorted by out-degree and is not a
 * valid topological order.
 */
export interface OrderingResult {
  order: string[];
  degraded: boolean;
  /** Cycles found before breaking (empty when the first sort succeeded) */
  cycles: string[][];
  /** Optional edges removed to break cycles */
  removedEdges: DependencyEdge[];
}

export interface ConflictDetail {
  requiringPackage: string;
  requiredVersion: string;
  description: string;
}

export interface PackageConflict {
  packageName: string;
  conflicts: ConflictDetail[];
}

interface TreeNodeBase {
  name: string;
  /** Requirement on the edge that led here */
  requiredVersion?: string;
  optional?: boolean;
}

export interface ResolvedTreeNode extends TreeNodeBase {
  version?: string;
  dependencies: DependencyTreeNode[];
}

/** The package already appears on the path from the root */
export interface CircularTreeNode extends TreeNodeBase {
  circular: true;
}

/** The package has no entry in the graph */
export interface MissingTreeNode extends TreeNodeBase {
  notFound: true;
}

export type DependencyTreeNode = ResolvedTreeNode | CircularTreeNode | MissingTreeNode;

/**
 * Graph produced by the resolver's discovery phase.
 */
export interface GraphBuildResult {
  graph: DependencyGraph;
  /** Names no metadata source knew, in discovery order */
  unresolved: string[];
  /** Depth truncations and lookups that found nothing */
  warnings: string[];
}

export interface Resolution {
  installationOrder: string[];
  missing: string[];
  degraded: boolean;
  cycles: string[][];
  removedEdges: DependencyEdge[];
  conflicts: PackageConflict[];
  /** The graph as built, before any cycle breaking */
  graph: DependencyGraph;
  warnings: string[];
}

export interface DependencyReport {
  packages: string[];
  installationOrder: string[];
  missingPackages: string[];
  versionConflicts: PackageConflict[];
  dependencyTree: Record<string, DependencyTreeNode>;
  totalDependencies: number;
  ordering: 'topological' | 'degraded';
  cycles: string[][];
  removedEdges: Array<{ source: string; target: string; constraint?: string }>;
  warnings: string[];
}
