import type { Graph } from "../graph.js";
import { describeKey } from "../types.js";
import { rebuildPath, type ChildVisit, type TraversalVisit } from "./traversal.js";

/**
 * Lazily walks the graph depth-first (pre-order) from `start` using an
 * explicit stack. Neighbours are pushed in reverse insertion order so the
 * first inserted neighbour is explored first. A vertex may sit on the stack
 * more than once but is yielded only the first time it is popped.
 *
 * Throws `UnknownVertexError` immediately when `start` is not in the graph.
 */
export function depthFirst<K>(graph: Graph<K>, start: K): IterableIterator<TraversalVisit<K>> {
  graph.requireVertex(start);
  return walkDepthFirst(graph, start);
}

function* walkDepthFirst<K>(graph: Graph<K>, start: K): IterableIterator<TraversalVisit<K>> {
  const visited = new Set<K>();
  const stack: TraversalVisit<K>[] = [{ key: start, depth: 0, root: true }];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      break;
    }
    if (visited.has(current.key)) {
      continue;
    }
    visited.add(current.key);
    yield current;

    const neighbors = graph.getNeighbors(current.key);
    for (let index = neighbors.length - 1; index >= 0; index -= 1) {
      const neighbor = neighbors[index];
      if (!visited.has(neighbor)) {
        stack.push({ key: neighbor, depth: current.depth + 1, root: false, parent: current.key });
      }
    }
  }

  graph.logger?.debug("traversal_completed", {
    strategy: "dfs",
    start: describeKey(start),
    visited: visited.size,
  });
}

/** Vertex keys in depth-first pre-order from `start`. */
export function dfs<K>(graph: Graph<K>, start: K): IterableIterator<K> {
  const visits = depthFirst(graph, start);
  return (function* () {
    for (const visit of visits) {
      yield visit.key;
    }
  })();
}

/**
 * A path from `start` to `goal` following the depth-first tree, or `null`
 * when `goal` is unreachable. The path is not necessarily the shortest.
 */
export function findPathDfs<K>(graph: Graph<K>, start: K, goal: K): K[] | null {
  graph.requireVertex(goal);
  const parents = new Map<K, ChildVisit<K>>();
  for (const visit of depthFirst(graph, start)) {
    if (!visit.root) {
      parents.set(visit.key, visit);
    }
    if (visit.key === goal) {
      return rebuildPath(parents, goal);
    }
  }
  return null;
}
