import { BinaryMinHeap } from "../collections/binaryHeap.js";
import { NegativeWeightError } from "../errors.js";
import type { Edge, Graph } from "../graph.js";
import { rebuildPath, type ParentLink } from "./traversal.js";

export interface WeightedPathResult<K> {
  /** Sum of the edge weights along {@link path}; `Infinity` when unreachable. */
  readonly distance: number;
  readonly path: K[];
  /** Vertices in the order they were settled. */
  readonly visitedOrder: K[];
}

interface QueueEntry<K> {
  readonly key: K;
  readonly priority: number;
}

/** Edges without a weight cost one unit. */
export const DEFAULT_EDGE_WEIGHT = 1;

function edgeCost<K>(edge: Edge<K>): number {
  const weight = edge.weight ?? DEFAULT_EDGE_WEIGHT;
  if (weight < 0) {
    throw new NegativeWeightError(edge.from, edge.to, weight);
  }
  return weight;
}

/**
 * Dijkstra's shortest path between `start` and `goal`. Stops as soon as the
 * goal is settled. Throws `NegativeWeightError` when an explored edge carries
 * a negative weight.
 */
export function weightedShortestPath<K>(graph: Graph<K>, start: K, goal: K): WeightedPathResult<K> {
  graph.requireVertex(start);
  graph.requireVertex(goal);

  const distances = new Map<K, number>([[start, 0]]);
  const previous = new Map<K, ParentLink<K>>();
  const settled = new Set<K>();
  const visitedOrder: K[] = [];
  const queue = new BinaryMinHeap<QueueEntry<K>>((a, b) => a.priority - b.priority);
  queue.insert({ key: start, priority: 0 });

  while (!queue.isEmpty()) {
    const current = queue.extractMin();
    if (!current) {
      break;
    }
    if (settled.has(current.key)) {
      continue;
    }
    settled.add(current.key);
    visitedOrder.push(current.key);

    if (current.key === goal) {
      break;
    }

    for (const edge of graph.requireVertex(current.key).getEdges()) {
      const tentative = current.priority + edgeCost(edge);
      if (tentative < (distances.get(edge.to) ?? Number.POSITIVE_INFINITY)) {
        distances.set(edge.to, tentative);
        previous.set(edge.to, { parent: current.key });
        queue.insert({ key: edge.to, priority: tentative });
      }
    }
  }

  const distance = distances.get(goal);
  if (distance === undefined || !settled.has(goal)) {
    return { distance: Number.POSITIVE_INFINITY, path: [], visitedOrder };
  }

  return { distance, path: rebuildPath(previous, goal), visitedOrder };
}
