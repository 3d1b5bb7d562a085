import { Queue } from "../collections/queue.js";
import type { Graph } from "../graph.js";
import { describeKey } from "../types.js";
import { rebuildPath, type ChildVisit, type TraversalVisit } from "./traversal.js";

/**
 * Lazily walks the graph breadth-first from `start`. A vertex is marked as
 * seen when it is enqueued, so it is yielded once even when several paths
 * reach it. Neighbours are enqueued in edge insertion order.
 *
 * Throws `UnknownVertexError` immediately (not on the first `next()`) when
 * `start` is not part of the graph.
 */
export function breadthFirst<K>(graph: Graph<K>, start: K): IterableIterator<TraversalVisit<K>> {
  graph.requireVertex(start);
  return walkBreadthFirst(graph, start);
}

function* walkBreadthFirst<K>(graph: Graph<K>, start: K): IterableIterator<TraversalVisit<K>> {
  const seen = new Set<K>([start]);
  const queue = new Queue<TraversalVisit<K>>([{ key: start, depth: 0, root: true }]);
  let visited = 0;

  while (!queue.isEmpty()) {
    const current = queue.take();
    visited += 1;
    yield current;

    for (const neighbor of graph.getNeighbors(current.key)) {
      if (!seen.has(neighbor)) {
        seen.add(neighbor);
        queue.enqueue({ key: neighbor, depth: current.depth + 1, root: false, parent: current.key });
      }
    }
  }

  graph.logger?.debug("traversal_completed", { strategy: "bfs", start: describeKey(start), visited });
}

/** Vertex keys in breadth-first order from `start`. */
export function bfs<K>(graph: Graph<K>, start: K): IterableIterator<K> {
  const visits = breadthFirst(graph, start);
  return (function* () {
    for (const visit of visits) {
      yield visit.key;
    }
  })();
}

/**
 * Path from `start` to `goal` with the fewest edges, or `null` when `goal`
 * cannot be reached. Among equally short paths the one discovered first (by
 * edge insertion order) wins.
 */
export function shortestPath<K>(graph: Graph<K>, start: K, goal: K): K[] | null {
  graph.requireVertex(goal);
  const parents = new Map<K, ChildVisit<K>>();
  for (const visit of breadthFirst(graph, start)) {
    if (!visit.root) {
      parents.set(visit.key, visit);
    }
    if (visit.key === goal) {
      return rebuildPath(parents, goal);
    }
  }
  return null;
}

/**
 * Every vertex whose shortest distance from `start` is exactly `distance`,
 * in breadth-first order.
 */
export function verticesAtDistance<K>(graph: Graph<K>, start: K, distance: number): K[] {
  if (!Number.isInteger(distance) || distance < 0) {
    throw new RangeError(`Distance must be a non-negative integer but received '${String(distance)}'`);
  }
  const result: K[] = [];
  for (const visit of breadthFirst(graph, start)) {
    if (visit.depth > distance) {
      break;
    }
    if (visit.depth === distance) {
      result.push(visit.key);
    }
  }
  return result;
}
