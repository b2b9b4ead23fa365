import type { DependencyGraph } from './graph.js';
import type { DependencyEdge, DependencyTreeNode, ResolvedTreeNode } from './types.js';

interface TreeFrame {
  node: ResolvedTreeNode;
  edges: readonly DependencyEdge[];
  next: number;
}

function createTreeNode(graph: DependencyGraph, name: string, onPath: ReadonlySet<string>): DependencyTreeNode {
  if (onPath.has(name)) {
    return { name, circular: true };
  }
  const entry = graph.getNode(name);
  if (!entry) {
    return { name, notFound: true };
  }
  return entry.version ? { name, version: entry.version, dependencies: [] } : { name, dependencies: [] };
}

/**
 * Build the dependency tree below a package.
 * Cycle detection is per path: a package shared by two branches appears in
 * both, while a package that reappears on its own path is marked circular.
 * Walks with an explicit stack, so chains of any length are fine.
 */
export function buildDependencyTree(graph: DependencyGraph, packageName: string): DependencyTreeNode {
  const onPath = new Set<string>();
  const root = createTreeNode(graph, packageName, onPath);
  if (!('dependencies' in root)) {
    return root;
  }

  onPath.add(packageName);
  const frames: TreeFrame[] = [{ node: root, edges: graph.getDependencies(packageName), next: 0 }];

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (frame.next >= frame.edges.length) {
      frames.pop();
      onPath.delete(frame.node.name);
      continue;
    }

    const edge = frame.edges[frame.next++];
    const child = createTreeNode(graph, edge.target.name, onPath);
    if (edge.constraint) {
      child.requiredVersion = edge.constraint;
    }
    if (edge.optional) {
      child.optional = true;
    }
    frame.node.dependencies.push(child);

    if ('dependencies' in child) {
      onPath.add(child.name);
      frames.push({ node: child, edges: graph.getDependencies(child.name), next: 0 });
    }
  }

  return root;
}

/**
 * Trees for each requested root, keyed by name.
 */
export function buildDependencyTrees(
  graph: DependencyGraph,
  roots: string[]
): Record<string, DependencyTreeNode> {
  const trees: Record<string, DependencyTreeNode> = {};
  for (const root of roots) {
    trees[root] = buildDependencyTree(graph, root);
  }
  return trees;
}
