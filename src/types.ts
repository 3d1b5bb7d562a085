/**
 * Stable error codes attached to every {@link GraphError}. Codes are grouped by
 * family so callers (and the CLI) can branch on them without parsing messages.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    UNKNOWN_VERTEX: "E-GRAPH-UNKNOWN-VERTEX",
    CYCLE: "E-GRAPH-CYCLE",
    NEGATIVE_WEIGHT: "E-GRAPH-NEGATIVE-WEIGHT",
  },
  INPUT: {
    FORMAT: "E-INPUT-FORMAT",
    DEFINITION: "E-INPUT-DEFINITION",
  },
} as const;

/** Flat access to the codes (e.g. `ERROR_CODES.GRAPH_CYCLE`). */
export const ERROR_CODES = {
  GRAPH_UNKNOWN_VERTEX: ERROR_CATALOG.GRAPH.UNKNOWN_VERTEX,
  GRAPH_CYCLE: ERROR_CATALOG.GRAPH.CYCLE,
  GRAPH_NEGATIVE_WEIGHT: ERROR_CATALOG.GRAPH.NEGATIVE_WEIGHT,
  INPUT_FORMAT: ERROR_CATALOG.INPUT.FORMAT,
  INPUT_DEFINITION: ERROR_CATALOG.INPUT.DEFINITION,
} as const;

/** Union type representing every stable error code. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Keys accepted by the JSON and text graph formats. */
export type VertexKeyLiteral = string | number;

/** Renders a vertex key for messages and log payloads. */
export function describeKey(key: unknown): string {
  return typeof key === "string" ? key : String(key);
}
