/**
 * @fileoverview Category hierarchy
 *
 * Directed parent -> child graph of category names, built incrementally by
 * the caller before planning. Depth is the longest parent chain above a
 * node and is memoized; the cache is only dropped by `clearDepthCache()`
 * since the graph is append-only within a session.
 *
 * Cycles: a node met again while its own depth is being computed
 * contributes 0 for that branch. In A -> B -> C -> A, the first node asked
 * for gets the largest depth of the cycle (depth(A) = 3 when A is queried
 * first, with B = 1 and C = 2 cached along the way). Self-loops are stored
 * but never count as a parent.
 */

type Graph = Map<string, Set<string>>;

/** Pending depth computation; `deepest` is -1 until a parent resolves. */
interface DepthFrame {
  category: string;
  parents: string[];
  next: number;
  deepest: number;
}

export class CategoryGraph {
  private readonly children: Graph = new Map();
  private readonly parents: Graph = new Map();
  private readonly depthCache = new Map<string, number>();

  registerEdge(parent: string, child: string): void {
    link(this.children, parent, child);
    link(this.parents, child, parent);
    if (!this.parents.has(parent)) this.parents.set(parent, new Set());
    if (!this.children.has(child)) this.children.set(child, new Set());
  }

  has(category: string): boolean {
    return this.children.has(category);
  }

  /** Every registered category, parents and children alike, in first-seen order. */
  categories(): string[] {
    return Array.from(this.children.keys());
  }

  childrenOf(category: string): string[] {
    return Array.from(this.children.get(category) ?? []);
  }

  parentsOf(category: string): string[] {
    return Array.from(this.parents.get(category) ?? []).filter((parent) => parent !== category);
  }

  get size(): number {
    return this.children.size;
  }

  depth(category: string): number {
    const cached = this.depthCache.get(category);
    if (cached !== undefined) return cached;

    // Explicit stack: hierarchies can be deeper than the call stack.
    const visiting = new Set<string>([category]);
    const stack: DepthFrame[] = [this.frameFor(category)];
    let resolved = 0;

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next < frame.parents.length) {
        const parent = frame.parents[frame.next];
        frame.next += 1;
        const known = this.depthCache.get(parent);
        if (known !== undefined) {
          frame.deepest = Math.max(frame.deepest, known);
        } else if (visiting.has(parent)) {
          frame.deepest = Math.max(frame.deepest, 0);
        } else {
          visiting.add(parent);
          stack.push(this.frameFor(parent));
        }
        continue;
      }

      stack.pop();
      resolved = frame.deepest + 1;
      this.depthCache.set(frame.category, resolved);
      const child = stack.length > 0 ? stack[stack.length - 1] : undefined;
      if (child) child.deepest = Math.max(child.deepest, resolved);
    }

    return resolved;
  }

  clearDepthCache(): void {
    this.depthCache.clear();
  }

  private frameFor(category: string): DepthFrame {
    return { category, parents: this.parentsOf(category), next: 0, deepest: -1 };
  }

  /**
   * Categories reachable within `maxDistance` hops following child and
   * parent edges alike. The source itself is never included.
   */
  related(category: string, maxDistance = 2): Array<[string, number]> {
    const result: Array<[string, number]> = [];
    const visited = new Set<string>([category]);
    let frontier = [category];

    for (let distance = 1; distance <= maxDistance && frontier.length > 0; distance++) {
      const next: string[] = [];
      for (const current of frontier) {
        const neighbours = [
          ...(this.children.get(current) ?? []),
          ...(this.parents.get(current) ?? []),
        ];
        for (const neighbour of neighbours) {
          if (visited.has(neighbour)) continue;
          visited.add(neighbour);
          result.push([neighbour, distance]);
          next.push(neighbour);
        }
      }
      frontier = next;
    }

    return result;
  }

  /**
   * Weight per category: deeper (more specific) categories weigh more,
   * scaled by an optional similarity score (default 1.0).
   */
  weightsFor(
    categories: readonly string[],
    similarityScores?: Readonly<Record<string, number>>
  ): Record<string, number> {
    return Object.fromEntries(
      categories.map((category) => {
        const depthScore = 0.5 + Math.min(this.depth(category) / 10, 1.0);
        const similarity =
          similarityScores && Object.hasOwn(similarityScores, category) ? similarityScores[category] : 1.0;
        return [category, depthScore * similarity];
      })
    );
  }
}

function link(graph: Graph, from: string, to: string): void {
  let targets = graph.get(from);
  if (!targets) {
    targets = new Set();
    graph.set(from, targets);
  }
  targets.add(to);
}
