import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { breadthFirst } from "../../src/algorithms/bfs.js";
import { CycleDetectedError } from "../../src/errors.js";
import { Graph } from "../../src/graph.js";

interface GeneratedGraph {
  readonly size: number;
  readonly edges: ReadonlyArray<readonly [number, number]>;
}

/** Random directed graphs over the vertices `0..size-1`, self-loops included. */
const graphArb: fc.Arbitrary<GeneratedGraph> = fc.integer({ min: 1, max: 9 }).chain((size) =>
  fc.record({
    size: fc.constant(size),
    edges: fc.array(fc.tuple(fc.nat(size - 1), fc.nat(size - 1)), { maxLength: size * 3 }),
  }),
);

/** Random DAGs: every edge points from a lower to a higher vertex index. */
const dagArb: fc.Arbitrary<GeneratedGraph> = graphArb.map(({ size, edges }) => ({
  size,
  edges: edges
    .filter(([a, b]) => a !== b)
    .map(([a, b]): readonly [number, number] => (a < b ? [a, b] : [b, a])),
}));

function build({ size, edges }: GeneratedGraph, directed = true): Graph<number> {
  const graph = new Graph<number>({ directed });
  for (let key = 0; key < size; key += 1) {
    graph.addVertex(key);
  }
  for (const [from, to] of edges) {
    graph.addEdge(from, to);
  }
  return graph;
}

/** Reachability by fixpoint over the raw edge list, independent of the traversals. */
function reachableFrom({ edges }: GeneratedGraph, start: number, directed = true): Set<number> {
  const reached = new Set<number>([start]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const [from, to] of edges) {
      if (reached.has(from) && !reached.has(to)) {
        reached.add(to);
        grew = true;
      }
      if (!directed && reached.has(to) && !reached.has(from)) {
        reached.add(from);
        grew = true;
      }
    }
  }
  return reached;
}

describe("graph traversals (property-based)", () => {
  for (const [strategy, walk] of [
    ["bfs", (graph: Graph<number>, start: number) => Array.from(graph.bfs(start))],
    ["dfs", (graph: Graph<number>, start: number) => Array.from(graph.dfs(start))],
  ] as const) {
    it(`${strategy} visits every reachable vertex exactly once`, () => {
      fc.assert(
        fc.property(graphArb, fc.boolean(), fc.nat(), (sample, directed, seed) => {
          const start = seed % sample.size;
          const order = walk(build(sample, directed), start);
          const expected = reachableFrom(sample, start, directed);

          expect(order[0]).to.equal(start);
          expect(new Set(order).size).to.equal(order.length);
          expect([...order].sort((a, b) => a - b)).to.deep.equal([...expected].sort((a, b) => a - b));
        }),
      );
    });
  }

  it("bfs depths never grow by more than one along an edge", () => {
    fc.assert(
      fc.property(graphArb, (sample) => {
        const depth = new Map<number, number>();
        let previous = 0;
        for (const visit of breadthFirst(build(sample), 0)) {
          expect(visit.depth).to.be.within(previous, previous + 1);
          previous = visit.depth;
          depth.set(visit.key, visit.depth);
        }

        for (const [from, to] of sample.edges) {
          const fromDepth = depth.get(from);
          if (fromDepth !== undefined) {
            expect(depth.get(to) ?? Infinity).to.be.at.most(fromDepth + 1);
          }
        }
      }),
    );
  });
});

describe("topological sort (property-based)", () => {
  it("places the source of every edge before its target on a DAG", () => {
    fc.assert(
      fc.property(dagArb, (sample) => {
        const order = build(sample).topologicalSort();
        const position = new Map(order.map((key, index) => [key, index] as const));

        expect(order).to.have.length(sample.size);
        for (const [from, to] of sample.edges) {
          expect(position.get(from) ?? -1).to.be.lessThan(position.get(to) ?? -1);
        }
      }),
    );
  });

  it("throws CycleDetectedError as soon as a back edge closes a cycle", () => {
    fc.assert(
      fc.property(dagArb, fc.nat(), fc.nat(), (sample, a, b) => {
        const low = Math.min(a % sample.size, b % sample.size);
        const high = Math.max(a % sample.size, b % sample.size);
        const graph = build(sample);
        // low -> ... -> high -> low, or a self-loop when both picks coincide.
        if (low !== high) {
          graph.addEdge(low, high);
        }
        graph.addEdge(high, low);

        expect(() => graph.topologicalSort()).to.throw(CycleDetectedError);
      }),
    );
  });
});
