export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./graph.js";
export * from "./collections/queue.js";
export * from "./collections/binaryHeap.js";
export * from "./algorithms/traversal.js";
export * from "./algorithms/bfs.js";
export * from "./algorithms/dfs.js";
export * from "./algorithms/topologicalSort.js";
export * from "./algorithms/cycles.js";
export * from "./algorithms/components.js";
export * from "./algorithms/bipartite.js";
export * from "./algorithms/dijkstra.js";
export * from "./config/engine.js";
export * from "./io/definition.js";
export * from "./io/textFormat.js";
export * from "./io/loader.js";
