/**
 * Dependency DAG over vendor, family, descriptor and artifact nodes.
 * Edges point from an input to the things built from it.
 */

import { CacheError } from '../../utils/errors';

export class DependencyGraph {
  private edges = new Map<string, Set<string>>();

  has(id: string): boolean {
    return this.edges.has(id);
  }

  addNode(id: string): void {
    if (!this.edges.has(id)) {
      this.edges.set(id, new Set());
    }
  }

  /**
   * Adds `from → to`. An edge that would close a cycle is rejected and the
   * graph is left unchanged.
   */
  addEdge(from: string, to: string): void {
    if (from === to || this.dependentsOf(to).has(from)) {
      throw new CacheError('Cycle', `Dependency ${from} -> ${to} would create a cycle`, {
        operation: 'addEdge',
        from,
        to,
      });
    }
    this.addNode(from);
    this.addNode(to);
    this.edges.get(from)?.add(to);
  }

  /** Adds a chain `a → b → c ...`. */
  addChain(ids: readonly string[]): void {
    for (let i = 1; i < ids.length; i++) {
      this.addEdge(ids[i - 1], ids[i]);
    }
  }

  removeNode(id: string): void {
    this.edges.delete(id);
    for (const targets of this.edges.values()) {
      targets.delete(id);
    }
  }

  /** Direct dependents only. */
  childrenOf(id: string): string[] {
    return [...(this.edges.get(id) ?? [])];
  }

  /** Every transitive dependent of `id`, excluding `id` itself. */
  dependentsOf(id: string): Set<string> {
    const seen = new Set<string>();
    const queue = [...(this.edges.get(id) ?? [])];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...(this.edges.get(next) ?? []));
    }
    return seen;
  }

  clear(): void {
    this.edges.clear();
  }

  get size(): number {
    return this.edges.size;
  }
}
