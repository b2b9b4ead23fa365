/**
 * Dependency resolver.
 * Discovers the transitive dependencies of the requested packages, orders
 * them for installation, and reports conflicts.
 */

import { DependencyGraph } from './graph.js';
import { checkVersionConflicts } from './conflict-detector.js';
import { effectiveConstraint } from './dependency-spec.js';
import { buildDependencyTrees } from './tree-builder.js';
import type { DependencyReport, GraphBuildResult, Resolution } from './types.js';
import type { MetadataSource, PackageMetadata } from '../metadata/types.js';
import { logger } from '../../utils/logger.js';

export const MAX_DEPTH_DEFAULT = 20;

export interface ResolverOptions {
  /** Configured repositories, consulted first */
  live?: MetadataSource;
  /** Installed packages, consulted when the live source has nothing */
  installed?: MetadataSource;
  maxDepth?: number;
}

interface PendingPackage {
  name: string;
  depth: number;
}

export class DependencyResolver {
  private readonly live?: MetadataSource;
  private readonly installed?: MetadataSource;
  private readonly maxDepth: number;

  constructor(options: ResolverOptions = {}) {
    this.live = options.live;
    this.installed = options.installed;
    this.maxDepth = options.maxDepth ?? MAX_DEPTH_DEFAULT;
  }

  /**
   * Build the graph reachable from `requested`.
   *
   * A package is expanded at most once per call, but every edge into it is
   * recorded, so conflict detection still sees each requirer.
   */
  buildDependencyGraph(requested: string[], includeInstalled: boolean = true): GraphBuildResult {
    const graph = new DependencyGraph();
    const visited = new Set<string>();
    const unresolved: string[] = [];
    const warnings: string[] = [];

    // Reversed so the first requested package is expanded first
    const stack: PendingPackage[] = requested.map(name => ({ name, depth: 0 })).reverse();

    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;

      if (current.depth > this.maxDepth) {
        const message = `Max dependency depth ${this.maxDepth} reached at ${current.name}, not expanding further`;
        logger.warn(message);
        warnings.push(message);
        continue;
      }

      if (visited.has(current.name)) {
        continue;
      }
      visited.add(current.name);

      const metadata = this.lookup(current.name, includeInstalled);
      if (!metadata) {
        const message = `Package ${current.name} not found in repositories or installed packages`;
        logger.warn(message);
        warnings.push(message);
        unresolved.push(current.name);
        continue;
      }

      graph.addNode(current.name, metadata.version);

      const children: PendingPackage[] = [];
      for (const dependency of metadata.dependencies) {
        const depName = dependency.name.trim();
        if (!depName) {
          continue;
        }
        graph.addEdge(current.name, depName, effectiveConstraint(dependency), dependency.optional);
        children.push({ name: depName, depth: current.depth + 1 });
      }

      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }

    return { graph, unresolved, warnings };
  }

  /**
   * Installation order and missing packages for `requested`.
   * Ordering runs on a copy, so `graph` in the result keeps every edge.
   */
  resolve(requested: string[], includeInstalled: boolean = true): Resolution {
    return this.resolveGraph(this.buildDependencyGraph(requested, includeInstalled));
  }

  /**
   * Full report: order, missing packages, conflicts and per-root trees.
   */
  generateReport(requested: string[]): DependencyReport {
    const resolution = this.resolve(requested, true);
    const { graph } = resolution;

    return {
      packages: [...requested],
      installationOrder: resolution.installationOrder,
      missingPackages: resolution.missing,
      versionConflicts: resolution.conflicts,
      dependencyTree: buildDependencyTrees(graph, requested),
      totalDependencies: resolution.installationOrder.length,
      ordering: resolution.degraded ? 'degraded' : 'topological',
      cycles: resolution.cycles,
      removedEdges: resolution.removedEdges.map(edge => ({
        source: edge.source.name,
        target: edge.target.name,
        ...(edge.constraint ? { constraint: edge.constraint } : {})
      })),
      warnings: resolution.warnings
    };
  }

  private resolveGraph(built: GraphBuildResult): Resolution {
    const { graph, unresolved, warnings } = built;

    const conflicts = checkVersionConflicts(graph);
    for (const conflict of conflicts) {
      logger.warn(`Version conflicts for ${conflict.packageName}:`);
      for (const detail of conflict.conflicts) {
        logger.warn(`  Required by ${detail.requiringPackage} with ${detail.requiredVersion}: ${detail.description}`);
      }
    }

    const ordering = graph.clone().resolveOrdering();
    if (ordering.degraded) {
      warnings.push('Installation order is degraded: a dependency cycle has no optional edge to remove');
    }

    return {
      installationOrder: ordering.order,
      missing: [...unresolved],
      degraded: ordering.degraded,
      cycles: ordering.cycles,
      removedEdges: ordering.removedEdges,
      conflicts,
      graph,
      warnings
    };
  }

  private lookup(packageName: string, includeInstalled: boolean): PackageMetadata | undefined {
    const live = this.live?.lookup(packageName);
    if (live) {
      return live;
    }
    if (includeInstalled && this.installed) {
      return this.installed.lookup(packageName);
    }
    return undefined;
  }
}
