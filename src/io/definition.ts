import { z } from "zod";

import { GraphDefinitionError } from "../errors.js";
import { Graph } from "../graph.js";
import type { Logger } from "../logger.js";
import type { VertexKeyLiteral } from "../types.js";

const VertexKeySchema = z.union([z.string().min(1), z.number().finite()]);

const EdgeDefinitionSchema = z
  .object({
    from: VertexKeySchema,
    to: VertexKeySchema,
    weight: z.number().finite().optional(),
  })
  .strict();

/** JSON shape accepted by {@link buildGraph}. */
export const GraphDefinitionSchema = z
  .object({
    directed: z.boolean().default(true),
    vertices: z.array(VertexKeySchema).default([]),
    edges: z.array(EdgeDefinitionSchema).default([]),
  })
  .strict();

export type GraphDefinition = z.input<typeof GraphDefinitionSchema>;

export interface BuildGraphOptions {
  readonly logger?: Logger;
}

/**
 * Validates a JSON graph definition and builds the corresponding graph.
 * Schema failures raise {@link GraphDefinitionError}; edges naming an
 * undeclared vertex raise `UnknownVertexError` from {@link Graph.addEdge}.
 */
export function buildGraph(input: unknown, options: BuildGraphOptions = {}): Graph<VertexKeyLiteral> {
  const parsed = GraphDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new GraphDefinitionError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }

  const definition = parsed.data;
  const graph = new Graph<VertexKeyLiteral>({
    directed: definition.directed,
    ...(options.logger ? { logger: options.logger } : {}),
  });
  for (const key of definition.vertices) {
    graph.addVertex(key);
  }
  for (const edge of definition.edges) {
    graph.addEdge(edge.from, edge.to, edge.weight);
  }
  return graph;
}
