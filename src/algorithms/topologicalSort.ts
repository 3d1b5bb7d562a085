import { Queue } from "../collections/queue.js";
import { CycleDetectedError } from "../errors.js";
import type { Graph } from "../graph.js";
import { describeKey } from "../types.js";
import { detectCycles } from "./cycles.js";

/**
 * Orders the vertices so every edge points from an earlier to a later
 * position (Kahn's algorithm). Vertices with in-degree zero are released in
 * vertex insertion order, then in the order their last incoming edge is
 * removed.
 *
 * Throws {@link CycleDetectedError} when the graph has a cycle. An undirected
 * graph with at least one edge always has one.
 */
export function topologicalSort<K>(graph: Graph<K>): K[] {
  const vertices = graph.listVertices();
  const indegree = new Map<K, number>();
  const queue = new Queue<K>();
  for (const key of vertices) {
    const degree = graph.requireVertex(key).inDegree;
    indegree.set(key, degree);
    if (degree === 0) {
      queue.enqueue(key);
    }
  }

  const order: K[] = [];
  while (!queue.isEmpty()) {
    const current = queue.take();
    order.push(current);
    for (const neighbor of graph.getNeighbors(current)) {
      const updated = (indegree.get(neighbor) ?? 0) - 1;
      indegree.set(neighbor, updated);
      if (updated === 0) {
        queue.enqueue(neighbor);
      }
    }
  }

  if (order.length !== vertices.length) {
    const blocked = vertices.filter((key) => (indegree.get(key) ?? 0) > 0);
    const [cycle] = detectCycles(graph, 1).cycles;
    graph.logger?.warn("topological_sort_cycle", {
      ordered: order.length,
      blocked: blocked.map((key) => describeKey(key)),
    });
    throw new CycleDetectedError(cycle ?? blocked);
  }
  return order;
}
