import { bfs } from "./algorithms/bfs.js";
import { dfs } from "./algorithms/dfs.js";
import { topologicalSort } from "./algorithms/topologicalSort.js";
import { UnknownVertexError } from "./errors.js";
import type { Logger } from "./logger.js";
import { describeKey } from "./types.js";

export interface Edge<K> {
  readonly from: K;
  readonly to: K;
  readonly weight?: number;
}

export interface GraphOptions {
  /** Defaults to `true`. Undirected edges are stored in both directions. */
  readonly directed?: boolean;
  /** Receives traversal and diagnostic events. */
  readonly logger?: Logger;
}

/**
 * A vertex and its adjacency. Outgoing edges are keyed by neighbour and keep
 * insertion order, which is the order every traversal visits them in.
 */
export class Vertex<K> {
  private readonly outgoing = new Map<K, Edge<K>>();
  private readonly incoming = new Set<K>();

  constructor(readonly key: K) {}

  get outDegree(): number {
    return this.outgoing.size;
  }

  get inDegree(): number {
    return this.incoming.size;
  }

  hasNeighbor(key: K): boolean {
    return this.outgoing.has(key);
  }

  getNeighbors(): K[] {
    return Array.from(this.outgoing.keys());
  }

  getEdges(): Edge<K>[] {
    return Array.from(this.outgoing.values());
  }

  getEdge(to: K): Edge<K> | undefined {
    return this.outgoing.get(to);
  }

  /** Keys of the vertices holding an edge towards this one. */
  getPredecessors(): K[] {
    return Array.from(this.incoming);
  }

  /** @internal Called by {@link Graph.addEdge}; returns whether the edge is new. */
  link(edge: Edge<K>): boolean {
    const fresh = !this.outgoing.has(edge.to);
    this.outgoing.set(edge.to, edge);
    return fresh;
  }

  /** @internal */
  linkFrom(key: K): void {
    this.incoming.add(key);
  }

  toString(): string {
    const neighbors = this.getNeighbors().map((key) => describeKey(key));
    return `${describeKey(this.key)} adjacent to [${neighbors.join(", ")}]`;
  }
}

/**
 * Directed or undirected graph owning its vertices and edges. Vertices and
 * edges are only ever added; every edge endpoint is a vertex of the graph.
 */
export class Graph<K = string> {
  readonly directed: boolean;
  readonly logger: Logger | undefined;
  private readonly vertices = new Map<K, Vertex<K>>();
  private edges = 0;

  constructor(options: GraphOptions = {}) {
    this.directed = options.directed ?? true;
    this.logger = options.logger;
  }

  get vertexCount(): number {
    return this.vertices.size;
  }

  /** Number of distinct edges; an undirected edge counts once. */
  get edgeCount(): number {
    return this.edges;
  }

  /** Inserts the vertex when absent. An existing vertex is returned untouched. */
  addVertex(key: K): Vertex<K> {
    const existing = this.vertices.get(key);
    if (existing) {
      return existing;
    }
    const vertex = new Vertex(key);
    this.vertices.set(key, vertex);
    return vertex;
  }

  hasVertex(key: K): boolean {
    return this.vertices.has(key);
  }

  getVertex(key: K): Vertex<K> | undefined {
    return this.vertices.get(key);
  }

  /** Same as {@link getVertex} but throws {@link UnknownVertexError} when absent. */
  requireVertex(key: K): Vertex<K> {
    const vertex = this.vertices.get(key);
    if (!vertex) {
      throw new UnknownVertexError(key);
    }
    return vertex;
  }

  /**
   * Adds an edge `from -> to` (and `to -> from` when undirected). Adding an
   * existing edge again replaces its weight.
   */
  addEdge(from: K, to: K, weight?: number): Edge<K> {
    const source = this.requireVertex(from);
    const target = this.requireVertex(to);
    if (weight !== undefined && !Number.isFinite(weight)) {
      throw new RangeError(`Edge weight must be a finite number but received '${String(weight)}'`);
    }

    const edge: Edge<K> = weight === undefined ? { from, to } : { from, to, weight };
    const fresh = source.link(edge);
    target.linkFrom(from);
    if (!this.directed) {
      target.link(weight === undefined ? { from: to, to: from } : { from: to, to: from, weight });
      source.linkFrom(to);
    }
    if (fresh) {
      this.edges += 1;
    }
    return edge;
  }

  hasEdge(from: K, to: K): boolean {
    return this.vertices.get(from)?.hasNeighbor(to) ?? false;
  }

  getNeighbors(key: K): K[] {
    return this.requireVertex(key).getNeighbors();
  }

  listVertices(): K[] {
    return Array.from(this.vertices.keys());
  }

  /**
   * Lists every edge once. Undirected edges are reported in the direction of
   * the endpoint that was inserted first.
   */
  listEdges(): Edge<K>[] {
    const result: Edge<K>[] = [];
    const emitted = new Set<K>();
    for (const vertex of this.vertices.values()) {
      for (const edge of vertex.getEdges()) {
        if (this.directed || edge.to === vertex.key || !emitted.has(edge.to)) {
          result.push(edge);
        }
      }
      emitted.add(vertex.key);
    }
    return result;
  }

  /** Vertex keys in breadth-first order from `start`. */
  bfs(start: K): IterableIterator<K> {
    return bfs(this, start);
  }

  /** Vertex keys in depth-first pre-order from `start`. */
  dfs(start: K): IterableIterator<K> {
    return dfs(this, start);
  }

  /** Kahn's ordering; throws `CycleDetectedError` unless the graph is a DAG. */
  topologicalSort(): K[] {
    return topologicalSort(this);
  }

  toString(): string {
    const kind = this.directed ? "Directed" : "Undirected";
    const vertices = Array.from(this.vertices.values(), (vertex) => vertex.toString());
    return `${kind} graph with vertices: [${vertices.join("; ")}]`;
  }
}
