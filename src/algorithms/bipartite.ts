import { Queue } from "../collections/queue.js";
import type { Graph } from "../graph.js";
import { undirectedNeighbors } from "./components.js";

type Side = 0 | 1;

/**
 * Splits the vertices into two sides so that no edge joins two vertices of
 * the same side, or returns `null` when that is impossible. Edge direction is
 * ignored and every component is coloured, starting each one on the left.
 * Both sides list their vertices in insertion order.
 */
export function bipartition<K>(graph: Graph<K>): [K[], K[]] | null {
  const sides = new Map<K, Side>();

  for (const root of graph.listVertices()) {
    if (sides.has(root)) {
      continue;
    }
    sides.set(root, 0);
    const queue = new Queue<K>([root]);
    while (!queue.isEmpty()) {
      const current = queue.take();
      const side = sides.get(current) ?? 0;
      for (const neighbor of undirectedNeighbors(graph, current)) {
        const assigned = sides.get(neighbor);
        if (assigned === undefined) {
          sides.set(neighbor, side === 0 ? 1 : 0);
          queue.enqueue(neighbor);
        } else if (assigned === side) {
          return null;
        }
      }
    }
  }

  const left: K[] = [];
  const right: K[] = [];
  for (const key of graph.listVertices()) {
    (sides.get(key) === 1 ? right : left).push(key);
  }
  return [left, right];
}

export function isBipartite<K>(graph: Graph<K>): boolean {
  return bipartition(graph) !== null;
}
