import { GraphFormatError } from "../errors.js";
import { Graph } from "../graph.js";
import type { Logger } from "../logger.js";

export interface ParseGraphTextOptions {
  readonly logger?: Logger;
}

interface SourceLine {
  readonly text: string;
  readonly line: number;
}

const EDGE_PATTERN = /^\((.*)\)$/;

/**
 * Parses the line-based graph format:
 *
 * ```
 * D            // D = directed, G = undirected
 * A,B,C        // vertex keys
 * (A,B)        // one edge per line
 * (B,C,5)      // optional numeric weight
 * ```
 *
 * Blank lines and `//` comment lines are skipped.
 */
export function parseGraphText(source: string, options: ParseGraphTextOptions = {}): Graph<string> {
  const lines = significantLines(source);
  const [header, vertexLine, ...edgeLines] = lines;

  if (!header) {
    throw new GraphFormatError("Missing graph header ('D' or 'G')");
  }
  if (header.text !== "D" && header.text !== "G") {
    throw new GraphFormatError(`Expected 'D' or 'G' header but found '${header.text}'`, header.line);
  }
  if (!vertexLine) {
    throw new GraphFormatError("Missing vertex list", header.line);
  }

  const graph = new Graph<string>({
    directed: header.text === "D",
    ...(options.logger ? { logger: options.logger } : {}),
  });
  for (const key of splitFields(vertexLine.text)) {
    if (key.length === 0) {
      throw new GraphFormatError("Empty vertex key in vertex list", vertexLine.line);
    }
    graph.addVertex(key);
  }

  for (const entry of edgeLines) {
    const match = EDGE_PATTERN.exec(entry.text);
    if (!match) {
      throw new GraphFormatError(`Malformed edge '${entry.text}', expected '(from,to)' or '(from,to,weight)'`, entry.line);
    }
    const fields = splitFields(match[1]);
    if (fields.length < 2 || fields.length > 3) {
      throw new GraphFormatError(`Edge '${entry.text}' must have two or three fields`, entry.line);
    }
    const [from, to, rawWeight] = fields;
    for (const key of [from, to]) {
      if (!graph.hasVertex(key)) {
        throw new GraphFormatError(`Edge references unknown vertex '${key}'`, entry.line);
      }
    }
    graph.addEdge(from, to, rawWeight === undefined ? undefined : parseWeight(rawWeight, entry.line));
  }

  return graph;
}

function significantLines(source: string): SourceLine[] {
  const result: SourceLine[] = [];
  source.split(/\r?\n/).forEach((raw, index) => {
    const text = raw.trim();
    if (text.length === 0 || text.startsWith("//")) {
      return;
    }
    result.push({ text, line: index + 1 });
  });
  return result;
}

function splitFields(text: string): string[] {
  return text.split(",").map((field) => field.trim());
}

function parseWeight(raw: string, line: number): number {
  const value = raw.length === 0 ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new GraphFormatError(`Edge weight must be a number but received '${raw}'`, line);
  }
  return value;
}
