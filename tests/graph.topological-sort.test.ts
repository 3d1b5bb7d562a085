import { describe, it } from "mocha";
import { expect } from "chai";

import {
  CycleDetectedError,
  ERROR_CODES,
  Graph,
  StructuredLogger,
  topologicalSort,
  type LogEntry,
} from "../src/index.js";

function buildGraph(vertices: string[], edges: Array<[string, string]>, directed = true): Graph {
  const graph = new Graph({ directed });
  vertices.forEach((key) => graph.addVertex(key));
  edges.forEach(([from, to]) => graph.addEdge(from, to));
  return graph;
}

/** Directed path `0 -> 1 -> ... -> size-1`, closed back to 0 when `closed`. */
function buildChain(size: number, closed: boolean): Graph<number> {
  const graph = new Graph<number>();
  for (let key = 0; key < size; key += 1) {
    graph.addVertex(key);
  }
  for (let key = 1; key < size; key += 1) {
    graph.addEdge(key - 1, key);
  }
  if (closed) {
    graph.addEdge(size - 1, 0);
  }
  return graph;
}

describe("topological sort", () => {
  it("orders a DAG so every edge points forward", () => {
    const graph = buildGraph(
      ["shirt", "tie", "jacket", "belt", "pants", "shoes", "socks"],
      [
        ["shirt", "tie"],
        ["tie", "jacket"],
        ["shirt", "belt"],
        ["belt", "jacket"],
        ["pants", "belt"],
        ["pants", "shoes"],
        ["socks", "shoes"],
      ],
    );

    const order = graph.topologicalSort();
    expect(order).to.deep.equal(["shirt", "pants", "socks", "tie", "belt", "shoes", "jacket"]);
    for (const edge of graph.listEdges()) {
      expect(order.indexOf(edge.from)).to.be.lessThan(order.indexOf(edge.to));
    }
  });

  it("returns isolated vertices in insertion order", () => {
    const graph = buildGraph(["C", "A", "B"], []);
    expect(topologicalSort(graph)).to.deep.equal(["C", "A", "B"]);
  });

  it("returns an empty order for an empty graph", () => {
    expect(new Graph().topologicalSort()).to.deep.equal([]);
  });

  it("throws CycleDetectedError with a witness cycle", () => {
    const graph = buildGraph(
      ["A", "B", "C", "D"],
      [
        ["A", "B"],
        ["B", "C"],
        ["C", "B"],
        ["C", "D"],
      ],
    );

    try {
      graph.topologicalSort();
      expect.fail("topologicalSort should have thrown");
    } catch (error) {
      expect(error).to.be.instanceOf(CycleDetectedError);
      if (error instanceof CycleDetectedError) {
        expect(error.code).to.equal(ERROR_CODES.GRAPH_CYCLE);
        expect(error.cycle).to.deep.equal(["B", "C", "B"]);
        expect(error.message).to.equal("Graph contains a cycle: B -> C -> B");
      }
    }
  });

  it("treats a self-loop as a cycle", () => {
    const graph = buildGraph(["A"], [["A", "A"]]);
    expect(() => graph.topologicalSort()).to.throw(CycleDetectedError);
  });

  it("rejects undirected graphs that carry an edge", () => {
    const graph = buildGraph(["A", "B"], [["A", "B"]], false);
    expect(() => graph.topologicalSort()).to.throw(CycleDetectedError);
  });

  it("logs a warning before surfacing the cycle", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ level: "warn", sink: () => undefined, onEntry: (entry) => entries.push(entry) });
    const graph = new Graph({ logger });
    graph.addVertex("A");
    graph.addVertex("B");
    graph.addVertex("C");
    graph.addEdge("A", "B");
    graph.addEdge("B", "A");

    expect(() => graph.topologicalSort()).to.throw(CycleDetectedError);
    expect(entries).to.have.length(1);
    expect(entries[0].message).to.equal("topological_sort_cycle");
    expect(entries[0].payload).to.deep.equal({ ordered: 1, blocked: ["A", "B"] });
  });

  it("reports a long ring as a cycle with the whole ring as witness", () => {
    const graph = buildChain(50_000, true);

    let caught: unknown;
    try {
      graph.topologicalSort();
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(CycleDetectedError);
    const cycle = caught instanceof CycleDetectedError ? caught.cycle : [];
    expect(cycle).to.have.length(50_001);
    expect([cycle[0], cycle[1], cycle[49_999], cycle[50_000]]).to.deep.equal([0, 1, 49_999, 0]);
  });

  it("orders a long chain", () => {
    const order = buildChain(50_000, false).topologicalSort();
    expect(order).to.have.length(50_000);
    expect([order[0], order[49_999]]).to.deep.equal([0, 49_999]);
  });

  it("accepts undefined and null as vertex keys", () => {
    const graph = new Graph<string | undefined | null>();
    graph.addVertex(undefined);
    graph.addVertex("B");
    graph.addVertex(null);
    graph.addEdge(undefined, "B");
    graph.addEdge("B", null);

    expect(graph.topologicalSort()).to.deep.equal([undefined, "B", null]);
  });
});
