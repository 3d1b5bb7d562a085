import { describe, it } from "mocha";
import { expect } from "chai";

import { Graph, NegativeWeightError, UnknownVertexError, weightedShortestPath } from "../src/index.js";

function buildWeightedGraph(edges: Array<[string, string, number?]>, directed = true): Graph {
  const graph = new Graph({ directed });
  for (const [from, to, weight] of edges) {
    graph.addVertex(from);
    graph.addVertex(to);
    graph.addEdge(from, to, weight);
  }
  return graph;
}

describe("weightedShortestPath", () => {
  it("prefers the cheaper multi-hop route over a heavy direct edge", () => {
    const graph = buildWeightedGraph([
      ["Start", "Middle", 2],
      ["Middle", "End", 3],
      ["Start", "End", 10],
    ]);

    expect(weightedShortestPath(graph, "Start", "End")).to.deep.equal({
      distance: 5,
      path: ["Start", "Middle", "End"],
      visitedOrder: ["Start", "Middle", "End"],
    });
  });

  it("counts missing weights as one unit", () => {
    const graph = buildWeightedGraph([
      ["A", "B"],
      ["B", "C"],
      ["A", "C", 3],
    ]);

    const result = weightedShortestPath(graph, "A", "C");
    expect(result.distance).to.equal(2);
    expect(result.path).to.deep.equal(["A", "B", "C"]);
  });

  it("follows undirected edges both ways", () => {
    const graph = buildWeightedGraph(
      [
        ["A", "B", 4],
        ["C", "B", 1],
        ["A", "C", 1],
      ],
      false,
    );

    expect(weightedShortestPath(graph, "B", "A").path).to.deep.equal(["B", "C", "A"]);
  });

  it("reports unreachable goals with an infinite distance", () => {
    const graph = buildWeightedGraph([["A", "B", 1]]);
    graph.addVertex("Z");

    expect(weightedShortestPath(graph, "A", "Z")).to.deep.equal({
      distance: Number.POSITIVE_INFINITY,
      path: [],
      visitedOrder: ["A", "B"],
    });
  });

  it("returns a zero-length path when start and goal coincide", () => {
    const graph = buildWeightedGraph([["A", "B", 1]]);
    expect(weightedShortestPath(graph, "A", "A")).to.deep.equal({ distance: 0, path: ["A"], visitedOrder: ["A"] });
  });

  it("rejects negative weights and unknown vertices", () => {
    const graph = buildWeightedGraph([["A", "B", -1]]);

    expect(() => weightedShortestPath(graph, "A", "B")).to.throw(NegativeWeightError, "negative weight -1");
    expect(() => weightedShortestPath(graph, "A", "Q")).to.throw(UnknownVertexError);
  });
});
