/**
 * Display utilities for dependency reports.
 */

import type { DependencyReport, DependencyTreeNode } from './types.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';

function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

function getChildPrefix(parentPrefix: string, isLast: boolean): string {
  return parentPrefix + (isLast ? '    ' : '│   ');
}

export function formatTreeLabel(node: DependencyTreeNode): string {
  let label = node.name;
  if ('circular' in node) {
    label += ' (circular)';
  } else if ('notFound' in node) {
    label += ' (not found)';
  } else if (node.version) {
    label += `@${node.version}`;
  }
  if (node.requiredVersion) {
    label += ` [${node.requiredVersion}]`;
  }
  if (node.optional) {
    label += ' (optional)';
  }
  return label;
}

/**
 * Render a tree as lines, root first.
 */
export function renderDependencyTree(root: DependencyTreeNode): string[] {
  const lines: string[] = [];
  const pending: Array<{ node: DependencyTreeNode; prefix: string; label: string }> = [
    { node: root, prefix: '', label: formatTreeLabel(root) }
  ];

  // Children are pushed in reverse so they pop in order.
  while (pending.length > 0) {
    const item = pending.pop();
    if (!item) break;
    lines.push(item.label);
    if (!('dependencies' in item.node)) continue;

    const children = item.node.dependencies;
    for (let index = children.length - 1; index >= 0; index--) {
      const child = children[index];
      const isLast = index === children.length - 1;
      pending.push({
        node: child,
        prefix: getChildPrefix(item.prefix, isLast),
        label: item.prefix + getTreeConnector(isLast) + formatTreeLabel(child)
      });
    }
  }

  return lines;
}

/**
 * Display a dependency report to the user
 */
export function displayDependencyReport(report: DependencyReport, output?: OutputPort): void {
  const out = output ?? resolveOutput();

  for (const name of report.packages) {
    const tree = report.dependencyTree[name];
    if (tree) {
      out.info(renderDependencyTree(tree).join('\n'));
    }
  }

  const orderLabel = report.ordering === 'degraded' ? 'Installation order (degraded)' : 'Installation order';
  out.note(report.installationOrder.map((name, index) => `${index + 1}. ${name}`).join('\n'), orderLabel);

  if (report.missingPackages.length > 0) {
    out.warn(`Missing packages: ${report.missingPackages.join(', ')}`);
  }

  for (const conflict of report.versionConflicts) {
    out.warn(`Version conflicts for ${conflict.packageName}:`);
    for (const detail of conflict.conflicts) {
      out.message(`  required by ${detail.requiringPackage} with ${detail.requiredVersion}`);
    }
  }

  if (report.ordering === 'degraded') {
    out.error(`Unbreakable dependency cycle: ${report.cycles.map(cycle => cycle.join(' -> ')).join('; ')}`);
  }

  out.success(`Total: ${report.totalDependencies} packages`);
}
