import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import { GraphFormatError } from "../errors.js";
import type { Graph } from "../graph.js";
import type { Logger } from "../logger.js";
import type { VertexKeyLiteral } from "../types.js";
import { buildGraph } from "./definition.js";
import { parseGraphText } from "./textFormat.js";

export interface LoadGraphOptions {
  readonly logger?: Logger;
}

/**
 * Reads a graph from disk. `.json` files go through {@link buildGraph}, any
 * other extension through {@link parseGraphText}.
 */
export async function loadGraphFile(path: string, options: LoadGraphOptions = {}): Promise<Graph<VertexKeyLiteral>> {
  const contents = await readFile(path, "utf8");
  const format = extname(path).toLowerCase() === ".json" ? "json" : "text";
  const graph: Graph<VertexKeyLiteral> =
    format === "json" ? buildGraph(parseJson(contents), options) : parseGraphText(contents, options);

  options.logger?.info("graph_loaded", {
    file: path,
    format,
    directed: graph.directed,
    vertices: graph.vertexCount,
    edges: graph.edgeCount,
  });
  return graph;
}

function parseJson(contents: string): unknown {
  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new GraphFormatError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}
