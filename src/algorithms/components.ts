import { Queue } from "../collections/queue.js";
import type { Graph } from "../graph.js";

/**
 * Neighbours in the undirected view of the graph: outgoing targets followed
 * by predecessors that are not already listed.
 */
export function undirectedNeighbors<K>(graph: Graph<K>, key: K): K[] {
  const vertex = graph.requireVertex(key);
  const neighbors = vertex.getNeighbors();
  if (!graph.directed) {
    return neighbors;
  }
  const listed = new Set(neighbors);
  for (const predecessor of vertex.getPredecessors()) {
    if (!listed.has(predecessor)) {
      neighbors.push(predecessor);
    }
  }
  return neighbors;
}

/**
 * Connected components of the undirected view (weakly connected components
 * for directed graphs). Components follow vertex insertion order and list
 * their members in breadth-first order.
 */
export function connectedComponents<K>(graph: Graph<K>): K[][] {
  const seen = new Set<K>();
  const components: K[][] = [];

  for (const root of graph.listVertices()) {
    if (seen.has(root)) {
      continue;
    }
    seen.add(root);
    const component: K[] = [];
    const queue = new Queue<K>([root]);
    while (!queue.isEmpty()) {
      const current = queue.take();
      component.push(current);
      for (const neighbor of undirectedNeighbors(graph, current)) {
        if (!seen.has(neighbor)) {
          seen.add(neighbor);
          queue.enqueue(neighbor);
        }
      }
    }
    components.push(component);
  }

  return components;
}
