import type { Graph } from "../graph.js";

export interface CycleDetectionResult<K> {
  readonly hasCycle: boolean;
  readonly cycles: K[][];
}

/** Vertex being explored and the position of its next unexplored neighbour. */
interface CycleFrame<K> {
  readonly key: K;
  readonly neighbors: K[];
  next: number;
}

/**
 * Reports up to `limit` directed cycles, each closed (`[A, B, A]`). A cycle
 * is recorded whenever an edge reaches a vertex still on the current DFS
 * path. The walk keeps its own frame stack, so path length is not bounded by
 * the call stack.
 */
export function detectCycles<K>(graph: Graph<K>, limit = 20): CycleDetectionResult<K> {
  const onPath = new Set<K>();
  const finished = new Set<K>();
  const path: K[] = [];
  const cycles: K[][] = [];

  const enter = (key: K): CycleFrame<K> => {
    onPath.add(key);
    path.push(key);
    return { key, neighbors: graph.getNeighbors(key), next: 0 };
  };

  for (const root of graph.listVertices()) {
    if (cycles.length >= limit) {
      break;
    }
    if (finished.has(root)) {
      continue;
    }

    const frames: CycleFrame<K>[] = [enter(root)];
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (cycles.length >= limit || frame.next >= frame.neighbors.length) {
        frames.pop();
        path.pop();
        onPath.delete(frame.key);
        finished.add(frame.key);
        continue;
      }

      const neighbor = frame.neighbors[frame.next];
      frame.next += 1;
      if (onPath.has(neighbor)) {
        cycles.push(path.slice(path.indexOf(neighbor)).concat([neighbor]));
      } else if (!finished.has(neighbor)) {
        frames.push(enter(neighbor));
      }
    }
  }

  return { hasCycle: cycles.length > 0, cycles };
}

/**
 * Whether the graph contains a cycle. Undirected graphs ignore the edge
 * leading back to the parent, so only genuine cycles (or self-loops) count.
 */
export function containsCycle<K>(graph: Graph<K>): boolean {
  if (graph.directed) {
    return detectCycles(graph, 1).hasCycle;
  }

  const seen = new Set<K>();
  const parents = new Map<K, K>();
  for (const root of graph.listVertices()) {
    if (seen.has(root)) {
      continue;
    }
    seen.add(root);
    const stack: K[] = [root];
    while (stack.length > 0) {
      const current = stack[stack.length - 1];
      stack.length -= 1;
      for (const neighbor of graph.getNeighbors(current)) {
        if (neighbor === current) {
          return true;
        }
        if (!seen.has(neighbor)) {
          seen.add(neighbor);
          parents.set(neighbor, current);
          stack.push(neighbor);
        } else if (!parents.has(current) || parents.get(current) !== neighbor) {
          return true;
        }
      }
    }
  }
  return false;
}
