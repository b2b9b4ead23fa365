/**
 * JSON wire form of a dependency report (snake_case keys).
 */

import type { DependencyReport, DependencyTreeNode } from './types.js';

export interface DependencyTreeJson {
  name: string;
  version?: string;
  dependencies?: DependencyTreeJson[];
  required_version?: string;
  optional?: boolean;
  circular?: boolean;
  not_found?: boolean;
}

export interface VersionConflictJson {
  package: string;
  conflicts: Array<{
    requiring_package: string;
    required_version: string;
    description: string;
  }>;
}

export interface DependencyReportJson {
  packages: string[];
  installation_order: string[];
  missing_packages: string[];
  version_conflicts: VersionConflictJson[];
  dependency_tree: Record<string, DependencyTreeJson>;
  total_dependencies: number;
  ordering: 'topological' | 'degraded';
  cycles: string[][];
  removed_edges: Array<{ source: string; target: string; constraint?: string }>;
  warnings: string[];
}

function serializeNode(node: DependencyTreeNode): DependencyTreeJson {
  const json: DependencyTreeJson = { name: node.name };

  if ('circular' in node) {
    json.circular = true;
  } else if ('notFound' in node) {
    json.not_found = true;
  } else {
    if (node.version) {
      json.version = node.version;
    }
    json.dependencies = [];
  }

  if (node.requiredVersion) {
    json.required_version = node.requiredVersion;
  }
  if (node.optional) {
    json.optional = true;
  }
  return json;
}

/** Serialize a tree without recursing, so deep chains stay on the heap */
export function serializeTree(root: DependencyTreeNode): DependencyTreeJson {
  const rootJson = serializeNode(root);
  const pending: Array<{ node: DependencyTreeNode; json: DependencyTreeJson }> = [{ node: root, json: rootJson }];

  while (pending.length > 0) {
    const item = pending.pop();
    if (!item || !('dependencies' in item.node)) continue;
    const children = item.json.dependencies ?? [];
    for (const child of item.node.dependencies) {
      const childJson = serializeNode(child);
      children.push(childJson);
      pending.push({ node: child, json: childJson });
    }
  }

  return rootJson;
}

export function serializeReport(report: DependencyReport): DependencyReportJson {
  const tree: Record<string, DependencyTreeJson> = {};
  for (const [name, node] of Object.entries(report.dependencyTree)) {
    tree[name] = serializeTree(node);
  }

  return {
    packages: report.packages,
    installation_order: report.installationOrder,
    missing_packages: report.missingPackages,
    version_conflicts: report.versionConflicts.map(conflict => ({
      package: conflict.packageName,
      conflicts: conflict.conflicts.map(detail => ({
        requiring_package: detail.requiringPackage,
        required_version: detail.requiredVersion,
        description: detail.description
      }))
    })),
    dependency_tree: tree,
    total_dependencies: report.totalDependencies,
    ordering: report.ordering,
    cycles: report.cycles,
    removed_edges: report.removedEdges,
    warnings: report.warnings
  };
}

export function formatReportJson(report: DependencyReport): string {
  return JSON.stringify(serializeReport(report), null, 2);
}
