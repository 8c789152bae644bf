import type { TopologySnapshot } from '../types/Network';

export interface NetworkPath {
  nodes: string[];
  totalLatency: number;
  totalDistance: number;
}

interface QueueEntry {
  nodeId: string;
  priority: number;
}

// Binary min-heap keyed on (priority, nodeId)
class MinQueue {
  private heap: QueueEntry[] = [];

  get size(): number {
    return this.heap.length;
  }

  private less(a: QueueEntry, b: QueueEntry): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.nodeId < b.nodeId);
  }

  push(entry: QueueEntry): void {
    const heap = this.heap;
    heap.push(entry);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  pop(): QueueEntry | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last) {
      heap[0] = last;
      let i = 0;
      for (;;) {
        const left = 2 * i + 1;
        const right = left + 1;
        let smallest = i;
        if (left < heap.length && this.less(heap[left], heap[smallest])) smallest = left;
        if (right < heap.length && this.less(heap[right], heap[smallest])) smallest = right;
        if (smallest === i) break;
        [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
        i = smallest;
      }
    }
    return top;
  }
}

export class UnionFind {
  private parent: Map<string, string> = new Map();
  private rank: Map<string, number> = new Map();

  constructor(ids: Iterable<string>) {
    for (const id of ids) {
      this.parent.set(id, id);
      this.rank.set(id, 0);
    }
  }

  find(id: string): string {
    let root = id;
    while (this.parent.get(root) !== root) {
      const next = this.parent.get(root);
      if (next === undefined) return id;
      root = next;
    }
    // Path compression
    let current = id;
    while (current !== root) {
      const next = this.parent.get(current) ?? root;
      this.parent.set(current, root);
      current = next;
    }
    return root;
  }

  union(a: string, b: string): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;

    const rankA = this.rank.get(rootA) ?? 0;
    const rankB = this.rank.get(rootB) ?? 0;
    if (rankA < rankB) {
      this.parent.set(rootA, rootB);
    } else if (rankA > rankB) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootB, rootA);
      this.rank.set(rootA, rankA + 1);
    }
  }

  components(): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    this.parent.forEach((_, id) => {
      const root = this.find(id);
      const members = groups.get(root) ?? [];
      members.push(id);
      groups.set(root, members);
    });
    return groups;
  }
}

// Helpers for graph queries over a single snapshot
export class NetworkPathfinding {
  /**
   * Dijkstra over link latency. On equal cost the predecessor with the lowest
   * satellite id wins, so paths are reproducible across runs.
   */
  public static findShortestPath(
    snapshot: TopologySnapshot,
    sourceId: string,
    destinationId: string
  ): NetworkPath | null {
    if (!snapshot.adjacency.has(sourceId) || !snapshot.adjacency.has(destinationId)) {
      return null;
    }
    if (sourceId === destinationId) {
      return { nodes: [sourceId], totalLatency: 0, totalDistance: 0 };
    }

    const distances = new Map<string, number>([[sourceId, 0]]);
    const previous = new Map<string, string>();
    const settled = new Set<string>();
    const queue = new MinQueue();
    queue.push({ nodeId: sourceId, priority: 0 });

    while (queue.size > 0) {
      const entry = queue.pop();
      if (!entry || settled.has(entry.nodeId)) continue;
      const nodeId = entry.nodeId;
      settled.add(nodeId);
      if (nodeId === destinationId) break;

      const current = distances.get(nodeId) ?? Infinity;
      for (const neighbor of snapshot.adjacency.get(nodeId) ?? []) {
        if (settled.has(neighbor.id)) continue;

        const candidate = current + neighbor.link.latency;
        const existing = distances.get(neighbor.id) ?? Infinity;
        const prev = previous.get(neighbor.id);
        const tieWins = candidate === existing && prev !== undefined && nodeId < prev;

        if (candidate < existing || tieWins) {
          distances.set(neighbor.id, candidate);
          previous.set(neighbor.id, nodeId);
          queue.push({ nodeId: neighbor.id, priority: candidate });
        }
      }
    }

    if (!previous.has(destinationId)) return null;

    const nodes: string[] = [destinationId];
    let current = destinationId;
    while (current !== sourceId) {
      const prev = previous.get(current);
      if (prev === undefined) return null;
      nodes.unshift(prev);
      current = prev;
    }

    let totalDistance = 0;
    for (let i = 0; i < nodes.length - 1; i++) {
      const hop = (snapshot.adjacency.get(nodes[i]) ?? []).find((n) => n.id === nodes[i + 1]);
      totalDistance += hop?.link.distance ?? 0;
    }

    return { nodes, totalLatency: distances.get(destinationId) ?? Infinity, totalDistance };
  }

  /**
   * Breadth-first hop distances from `sourceId`, limited to `maxHops`.
   * The parent map follows the lowest-id neighbour first, giving stable paths.
   */
  public static hopDistances(
    snapshot: TopologySnapshot,
    sourceId: string,
    maxHops: number = Infinity
  ): { distances: Map<string, number>; parents: Map<string, string> } {
    const distances = new Map<string, number>([[sourceId, 0]]);
    const parents = new Map<string, string>();
    let frontier = [sourceId];

    for (let depth = 1; depth <= maxHops && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const nodeId of frontier) {
        for (const neighbor of snapshot.adjacency.get(nodeId) ?? []) {
          if (distances.has(neighbor.id)) continue;
          distances.set(neighbor.id, depth);
          parents.set(neighbor.id, nodeId);
          next.push(neighbor.id);
        }
      }
      next.sort();
      frontier = next;
    }

    return { distances, parents };
  }

  public static pathFromParents(parents: ReadonlyMap<string, string>, sourceId: string, targetId: string): string[] {
    const path = [targetId];
    let current = targetId;
    while (current !== sourceId) {
      const parent = parents.get(current);
      if (parent === undefined) return [];
      path.unshift(parent);
      current = parent;
    }
    return path;
  }

  public static connectedComponents(snapshot: TopologySnapshot): string[][] {
    const unionFind = new UnionFind(snapshot.adjacency.keys());
    for (const link of snapshot.links) {
      unionFind.union(link.a, link.b);
    }
    return Array.from(unionFind.components().values())
      .map((members) => members.sort())
      .sort((a, b) => b.length - a.length || (a[0] < b[0] ? -1 : 1));
  }
}
