import { ERROR_CODES, type ErrorCode, describeKey } from "./types.js";

/** Base class of every error raised by the graph engine and its loaders. */
export class GraphError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "GraphError";
  }
}

/** Raised when an edge, traversal or query names a vertex that is not in the graph. */
export class UnknownVertexError<K = unknown> extends GraphError {
  constructor(public readonly vertex: K) {
    super(ERROR_CODES.GRAPH_UNKNOWN_VERTEX, `Unknown vertex '${describeKey(vertex)}'`, {
      vertex: describeKey(vertex),
    });
    this.name = "UnknownVertexError";
  }
}

/**
 * Raised by topological sort when the graph is not acyclic. {@link cycle}
 * holds one closed witness cycle, e.g. `[A, B, A]`.
 */
export class CycleDetectedError<K = unknown> extends GraphError {
  constructor(public readonly cycle: readonly K[]) {
    const rendered = cycle.map((key) => describeKey(key));
    super(
      ERROR_CODES.GRAPH_CYCLE,
      rendered.length > 0 ? `Graph contains a cycle: ${rendered.join(" -> ")}` : "Graph contains a cycle",
      { cycle: rendered },
    );
    this.name = "CycleDetectedError";
  }
}

/** Raised by Dijkstra when it reaches an edge with a negative weight. */
export class NegativeWeightError<K = unknown> extends GraphError {
  constructor(
    public readonly from: K,
    public readonly to: K,
    public readonly weight: number,
  ) {
    super(
      ERROR_CODES.GRAPH_NEGATIVE_WEIGHT,
      `Edge '${describeKey(from)}' -> '${describeKey(to)}' has negative weight ${weight}`,
      { from: describeKey(from), to: describeKey(to), weight },
    );
    this.name = "NegativeWeightError";
  }
}

/** Raised when a graph file cannot be parsed. `line` is 1-based when known. */
export class GraphFormatError extends GraphError {
  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(ERROR_CODES.INPUT_FORMAT, line === undefined ? message : `${message} (line ${line})`, {
      ...(line === undefined ? {} : { line }),
    });
    this.name = "GraphFormatError";
  }
}

/** Issue reported by the JSON definition schema. */
export interface DefinitionIssue {
  readonly path: string;
  readonly message: string;
}

/** Raised when a JSON graph definition fails validation. */
export class GraphDefinitionError extends GraphError {
  constructor(public readonly issues: readonly DefinitionIssue[]) {
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
    super(ERROR_CODES.INPUT_DEFINITION, `Invalid graph definition: ${summary.join("; ")}`, {
      issues,
    });
    this.name = "GraphDefinitionError";
  }
}
