/**
 * Directed package dependency graph.
 * An edge "A -> B" means A requires B, so B is installed first.
 */

import type { DependencyEdge, OrderingResult, PackageIdentity } from './types.js';
import { logger } from '../../utils/logger.js';

export class DependencyGraph {
  private readonly nodes: Map<string, PackageIdentity> = new Map();
  private readonly outgoing: Map<string, DependencyEdge[]> = new Map();
  private readonly incoming: Map<string, DependencyEdge[]> = new Map();
  /** Every edge in insertion order */
  private edgeLog: DependencyEdge[] = [];

  /**
   * Add a node, or fill in the version of an existing one.
   * A known version is never overwritten.
   */
  addNode(name: string, version?: string): PackageIdentity {
    const existing = this.nodes.get(name);
    if (existing) {
      if (version && !existing.version) {
        existing.version = version;
      }
      return existing;
    }

    const node: PackageIdentity = version ? { name, version } : { name };
    this.nodes.set(name, node);
    this.outgoing.set(name, []);
    this.incoming.set(name, []);
    return node;
  }

  /**
   * Record that `sourceName` requires `targetName`. Both nodes are created if needed.
   * Parallel edges are kept.
   */
  addEdge(
    sourceName: string,
    targetName: string,
    constraint?: string,
    optional: boolean = false
  ): DependencyEdge {
    const source = this.addNode(sourceName);
    const target = this.addNode(targetName);

    const edge: DependencyEdge = { source, target, optional };
    if (constraint) {
      edge.constraint = constraint;
    }

    this.edgesOf(this.outgoing, sourceName).push(edge);
    this.edgesOf(this.incoming, targetName).push(edge);
    this.edgeLog.push(edge);
    return edge;
  }

  getNode(name: string): PackageIdentity | undefined {
    return this.nodes.get(name);
  }

  hasNode(name: string): boolean {
    return this.nodes.has(name);
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Node names in insertion order */
  nodeNames(): string[] {
    return Array.from(this.nodes.keys());
  }

  /** Outgoing edges of a node */
  getDependencies(name: string): readonly DependencyEdge[] {
    return this.outgoing.get(name) ?? [];
  }

  /** Incoming edges of a node */
  getDependents(name: string): readonly DependencyEdge[] {
    return this.incoming.get(name) ?? [];
  }

  edges(): readonly DependencyEdge[] {
    return [...this.edgeLog];
  }

  hasEdge(sourceName: string, targetName: string): boolean {
    return this.getDependencies(sourceName).some(edge => edge.target.name === targetName);
  }

  /** Number of distinct packages a node requires */
  outDegree(name: string): number {
    return this.successors(name).length;
  }

  /**
   * Independent copy with the same nodes, versions and edges.
   */
  clone(): DependencyGraph {
    const copy = new DependencyGraph();
    for (const node of this.nodes.values()) {
      copy.addNode(node.name, node.version);
    }
    for (const edge of this.edgeLog) {
      copy.addEdge(edge.source.name, edge.target.name, edge.constraint, edge.optional);
    }
    return copy;
  }

  /**
   * Remove every edge from `sourceName` to `targetName`.
   */
  removeEdges(sourceName: string, targetName: string): DependencyEdge[] {
    const removed = this.getDependencies(sourceName).filter(edge => edge.target.name === targetName);
    if (removed.length === 0) {
      return removed;
    }

    const isRemoved = (edge: DependencyEdge): boolean => removed.includes(edge);
    this.outgoing.set(sourceName, this.getDependencies(sourceName).filter(edge => !isRemoved(edge)));
    this.incoming.set(targetName, this.getDependents(targetName).filter(edge => !isRemoved(edge)));
    this.edgeLog = this.edgeLog.filter(edge => !isRemoved(edge));
    return removed;
  }

  /**
   * Kahn's algorithm. Dependencies come before their dependents; among
   * packages that are ready at the same time the earliest-added goes first.
   * Returns null when a cycle prevents a complete order.
   */
  topologicalOrder(): string[] | null {
    const names = this.nodeNames();
    const position = new Map(names.map((name, index) => [name, index]));
    const pending = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const name of names) {
      const targets = this.successors(name);
      pending.set(name, targets.length);
      for (const target of targets) {
        const list = dependents.get(target) ?? [];
        list.push(name);
        dependents.set(target, list);
      }
    }

    const ready: number[] = [];
    names.forEach((name, index) => {
      if (pending.get(name) === 0) {
        ready.push(index);
      }
    });

    const order: string[] = [];
    while (ready.length > 0) {
      const next = ready.shift();
      if (next === undefined) break;
      const name = names[next];
      order.push(name);

      for (const dependent of dependents.get(name) ?? []) {
        const remaining = (pending.get(dependent) ?? 0) - 1;
        pending.set(dependent, remaining);
        if (remaining === 0) {
          insertSorted(ready, position.get(dependent) ?? 0);
        }
      }
    }

    return order.length === names.length ? order : null;
  }

  /**
   * Enumerate simple cycles (Johnson's algorithm). Each cycle is listed once,
   * starting from its earliest-added node: [a, b, c] means a -> b -> c -> a.
   * Cycles that share a start come out in edge order.
   */
  detectCycles(): string[][] {
    const names = this.nodeNames();
    const position = new Map(names.map((name, index) => [name, index]));
    const indexOf = (name: string): number => position.get(name) ?? 0;
    const cycles: string[][] = [];

    let lowest = 0;
    while (lowest < names.length) {
      const floor = lowest;
      const components = this.stronglyConnectedComponents(name => indexOf(name) >= floor)
        .filter(component => this.isCyclic(component));

      let best: { start: number; members: Set<string> } | undefined;
      for (const component of components) {
        const start = component.reduce((least, name) => Math.min(least, indexOf(name)), names.length);
        if (!best || start < best.start) {
          best = { start, members: new Set(component) };
        }
      }
      if (!best) {
        break;
      }

      this.collectCircuits(names[best.start], best.members, cycles);
      lowest = best.start + 1;
    }

    return cycles;
  }

  /**
   * For each cycle still intact, remove the first link (in cycle order)
   * whose edges are all optional. Cycles without such a link are left alone.
   */
  breakCycles(cycles: string[][] = this.detectCycles()): DependencyEdge[] {
    const removed: DependencyEdge[] = [];

    for (const cycle of cycles) {
      if (!this.isCycleIntact(cycle)) {
        continue;
      }

      for (let i = 0; i < cycle.length; i++) {
        const source = cycle[i];
        const target = cycle[(i + 1) % cycle.length];
        const link = this.getDependencies(source).filter(edge => edge.target.name === target);
        if (link.length > 0 && link.every(edge => edge.optional)) {
          removed.push(...this.removeEdges(source, target));
          logger.info(`Breaking cycle by removing optional dependency: ${source} -> ${target}`);
          break;
        }
      }
    }

    return removed;
  }

  /**
   * Installation order that never throws. Tries a topological sort, then
   * breaks cycles through optional edges and retries, then falls back to
   * sorting by out-degree (fewest dependencies first) and flags the result
   * as degraded.
   */
  resolveOrdering(): OrderingResult {
    const order = this.topologicalOrder();
    if (order) {
      return { order, degraded: false, cycles: [], removedEdges: [] };
    }

    const cycles = this.detectCycles();
    logger.error(`Circular dependencies detected: ${cycles.map(cycle => cycle.join(' -> ')).join('; ')}`);

    const removedEdges = this.breakCycles(cycles);
    const retry = this.topologicalOrder();
    if (retry) {
      return { order: retry, degraded: false, cycles, removedEdges };
    }

    logger.warn('Unbreakable dependency cycle; installation order is a best-effort out-degree sort');
    const fallback = this.nodeNames()
      .map((name, index) => ({ name, index, degree: this.outDegree(name) }))
      .sort((a, b) => a.degree - b.degree || a.index - b.index)
      .map(entry => entry.name);

    return { order: fallback, degraded: true, cycles, removedEdges };
  }

  /** Distinct targets of a node, in edge order */
  private successors(name: string): string[] {
    const seen = new Set<string>();
    for (const edge of this.getDependencies(name)) {
      seen.add(edge.target.name);
    }
    return Array.from(seen);
  }

  private isCycleIntact(cycle: string[]): boolean {
    return cycle.every((source, i) => this.hasEdge(source, cycle[(i + 1) % cycle.length]));
  }

  private edgesOf(index: Map<string, DependencyEdge[]>, name: string): DependencyEdge[] {
    let list = index.get(name);
    if (!list) {
      list = [];
      index.set(name, list);
    }
    return list;
  }

  private isCyclic(component: string[]): boolean {
    return component.length > 1 || this.successors(component[0]).includes(component[0]);
  }

  /**
   * Every simple cycle through `start` inside `members`, with an explicit
   * frame stack. Blocked nodes stay blocked until a cycle through them is found.
   */
  private collectCircuits(start: string, members: Set<string>, cycles: string[][]): void {
    const blocked = new Set<string>([start]);
    const blockedBy = new Map<string, Set<string>>();
    const path: string[] = [start];
    const frames: CircuitFrame[] = [this.circuitFrame(start, members)];

    const unblock = (name: string): void => {
      const pending = [name];
      while (pending.length > 0) {
        const current = pending.pop();
        if (current === undefined || !blocked.has(current)) continue;
        blocked.delete(current);
        const waiting = blockedBy.get(current);
        if (waiting) {
          blockedBy.delete(current);
          pending.push(...waiting);
        }
      }
    };

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];

      if (frame.next < frame.successors.length) {
        const target = frame.successors[frame.next++];
        if (target === start) {
          cycles.push([...path]);
          frame.found = true;
        } else if (!blocked.has(target)) {
          blocked.add(target);
          path.push(target);
          frames.push(this.circuitFrame(target, members));
        }
        continue;
      }

      frames.pop();
      path.pop();
      if (frame.found) {
        unblock(frame.name);
      } else {
        for (const target of frame.successors) {
          const waiting = blockedBy.get(target) ?? new Set<string>();
          waiting.add(frame.name);
          blockedBy.set(target, waiting);
        }
      }

      const parent = frames[frames.length - 1];
      if (parent && frame.found) {
        parent.found = true;
      }
    }
  }

  private circuitFrame(name: string, members: Set<string>): CircuitFrame {
    return { name, successors: this.successors(name).filter(next => members.has(next)), next: 0, found: false };
  }

  /**
   * Tarjan's algorithm over the nodes accepted by `include`, iterative so
   * long dependency chains do not exhaust the call stack.
   */
  private stronglyConnectedComponents(include: (name: string) => boolean = () => true): string[][] {
    const indices = new Map<string, number>();
    const lowlinks = new Map<string, number>();
    const stack: string[] = [];
    const onStack = new Set<string>();
    const components: string[][] = [];
    const frames: TarjanFrame[] = [];
    let counter = 0;

    const lowOf = (name: string): number => lowlinks.get(name) ?? 0;

    const visit = (name: string): void => {
      indices.set(name, counter);
      lowlinks.set(name, counter);
      counter++;
      stack.push(name);
      onStack.add(name);
      frames.push({ name, successors: this.successors(name).filter(include), next: 0 });
    };

    for (const root of this.nodes.keys()) {
      if (!include(root) || indices.has(root)) continue;
      visit(root);

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];

        if (frame.next < frame.successors.length) {
          const next = frame.successors[frame.next++];
          const nextIndex = indices.get(next);
          if (nextIndex === undefined) {
            visit(next);
          } else if (onStack.has(next)) {
            lowlinks.set(frame.name, Math.min(lowOf(frame.name), nextIndex));
          }
          continue;
        }

        frames.pop();
        if (lowOf(frame.name) === indices.get(frame.name)) {
          const component: string[] = [];
          let member: string | undefined;
          do {
            member = stack.pop();
            if (member === undefined) break;
            onStack.delete(member);
            component.push(member);
          } while (member !== frame.name);
          components.push(component);
        }

        const parent = frames[frames.length - 1];
        if (parent) {
          lowlinks.set(parent.name, Math.min(lowOf(parent.name), lowOf(frame.name)));
        }
      }
    }

    return components;
  }
}

interface TarjanFrame {
  name: string;
  successors: string[];
  next: number;
}

interface CircuitFrame extends TarjanFrame {
  /** A cycle back to the start was found below this frame */
  found: boolean;
}

function insertSorted(values: number[], value: number): void {
  let low = 0;
  let high = values.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (values[mid] < value) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  values.splice(low, 0, value);
}
