#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { shortestPath, verticesAtDistance } from "./algorithms/bfs.js";
import { bipartition } from "./algorithms/bipartite.js";
import { connectedComponents } from "./algorithms/components.js";
import { detectCycles } from "./algorithms/cycles.js";
import { weightedShortestPath } from "./algorithms/dijkstra.js";
import { loadEngineConfig, type EngineConfig, type OutputFormat } from "./config/engine.js";
import { GraphError } from "./errors.js";
import type { Graph } from "./graph.js";
import { loadGraphFile } from "./io/loader.js";
import { StructuredLogger, type Logger } from "./logger.js";
import { describeKey, type VertexKeyLiteral } from "./types.js";

type CliGraph = Graph<VertexKeyLiteral>;

interface CliAnalysis {
  readonly name: string;
  readonly args: string[];
}

interface CliOptions {
  readonly file: string;
  readonly format?: OutputFormat;
  readonly analyses: CliAnalysis[];
}

export interface CliRuntime {
  /** Receives every output line. Defaults to `console.log`. */
  readonly write?: (line: string) => void;
  readonly config?: EngineConfig;
  readonly logger?: Logger;
}

interface AnalysisInput {
  readonly args: string[];
  readonly graph: CliGraph;
  readonly config: EngineConfig;
}

type Write = (line: string) => void;

interface AnalysisReport {
  readonly result: unknown;
  print(write: Write): void;
}

interface AnalysisHandler {
  readonly arity: number;
  readonly usage: string;
  run(input: AnalysisInput): AnalysisReport;
}

/** Binds an analysis to its text formatter so results keep their type. */
function defineAnalysis<R>(
  arity: number,
  usage: string,
  run: (input: AnalysisInput) => R,
  format: (result: R, write: Write) => void,
): AnalysisHandler {
  return {
    arity,
    usage,
    run: (input) => {
      const result = run(input);
      return { result, print: (write) => format(result, write) };
    },
  };
}

/** Loads the graph named on the command line and prints the requested analyses. */
export async function main(argv: string[], runtime: CliRuntime = {}): Promise<void> {
  const write = runtime.write ?? ((line: string) => console.log(line));
  if (argv.length === 0) {
    printUsage(write);
    throw new Error("Missing graph file argument");
  }

  const config = runtime.config ?? loadEngineConfig();
  const logger = runtime.logger ?? createCliLogger(config);
  const options = parseArgs(argv);
  const format = options.format ?? config.defaultFormat;
  const graph = await loadGraphFile(options.file, { logger });

  const tasks = options.analyses.length > 0 ? options.analyses : [{ name: "summary", args: [] }];
  const reports = tasks.map((task) => {
    const handler = lookupHandler(task.name);
    if (task.args.length !== handler.arity) {
      throw new Error(`${task.name} expects ${handler.usage}`);
    }
    return { name: task.name, args: task.args, report: handler.run({ args: task.args, graph, config }) };
  });

  if (format === "json") {
    write(
      JSON.stringify(
        {
          file: options.file,
          analyses: reports.map((report) => ({ name: report.name, args: report.args, result: toJson(report.report.result) })),
        },
        null,
        2,
      ),
    );
    return;
  }

  reports.forEach((report, index) => {
    if (index > 0) {
      write("");
    }
    write(`# ${[report.name, ...report.args].join(" ")}`);
    report.report.print(write);
  });
}

function createCliLogger(config: EngineConfig): StructuredLogger {
  return new StructuredLogger({
    level: config.logLevel,
    sink: (line) => process.stderr.write(line),
    ...(config.logFile === undefined ? {} : { logFile: config.logFile }),
  });
}

/**
 * Command line arguments are strings; JSON graphs may key vertices by
 * number. A string key wins, then a numeric key with the same spelling.
 */
function resolveKey(graph: CliGraph, raw: string): VertexKeyLiteral {
  if (graph.hasVertex(raw)) {
    return raw;
  }
  const numeric = Number(raw);
  if (raw.trim().length > 0 && Number.isFinite(numeric) && graph.hasVertex(numeric)) {
    return numeric;
  }
  return raw;
}

function renderKeys(keys: readonly VertexKeyLiteral[]): string[] {
  return keys.map((key) => describeKey(key));
}

/** Infinity does not survive JSON serialisation; report unreachable distances as null. */
function toJson(result: unknown): unknown {
  return JSON.parse(
    JSON.stringify(result, (_key, value: unknown) =>
      typeof value === "number" && !Number.isFinite(value) ? null : value,
    ),
  );
}

const formatOrder = (result: VertexKeyLiteral[], write: Write): void => {
  write(`Order: ${renderKeys(result).join(", ")}`);
};

const formatPath = (result: VertexKeyLiteral[] | null, write: Write): void => {
  write(`Path: ${result && result.length > 0 ? renderKeys(result).join(" -> ") : "(unreachable)"}`);
};

const analysisHandlers: Record<string, AnalysisHandler> = {
  summary: defineAnalysis(
    0,
    "no arguments",
    ({ graph }) => ({ directed: graph.directed, vertices: graph.vertexCount, edges: graph.edgeCount }),
    (summary, write) => {
      write(`Kind: ${summary.directed ? "directed" : "undirected"}`);
      write(`Vertices: ${summary.vertices}`);
      write(`Edges: ${summary.edges}`);
    },
  ),
  bfs: defineAnalysis(1, "<start>", ({ graph, args }) => Array.from(graph.bfs(resolveKey(graph, args[0]))), formatOrder),
  dfs: defineAnalysis(1, "<start>", ({ graph, args }) => Array.from(graph.dfs(resolveKey(graph, args[0]))), formatOrder),
  topologicalSort: defineAnalysis(0, "no arguments", ({ graph }) => graph.topologicalSort(), formatOrder),
  shortestPath: defineAnalysis(
    2,
    "<start> <goal>",
    ({ graph, args }) => shortestPath(graph, resolveKey(graph, args[0]), resolveKey(graph, args[1])),
    formatPath,
  ),
  weightedShortestPath: defineAnalysis(
    2,
    "<start> <goal>",
    ({ graph, args }) => weightedShortestPath(graph, resolveKey(graph, args[0]), resolveKey(graph, args[1])),
    (result, write) => {
      write(`Distance: ${Number.isFinite(result.distance) ? result.distance : "unreachable"}`);
      formatPath(result.path, write);
      write(`Visited order: ${renderKeys(result.visitedOrder).join(", ")}`);
    },
  ),
  distance: defineAnalysis(
    2,
    "<start> <n>",
    ({ graph, args }) => verticesAtDistance(graph, resolveKey(graph, args[0]), Number(args[1])),
    (result, write) => write(`Vertices: ${renderKeys(result).join(", ")}`),
  ),
  bipartite: defineAnalysis(
    0,
    "no arguments",
    ({ graph }) => {
      const sides = bipartition(graph);
      return sides === null ? { bipartite: false } : { bipartite: true, left: sides[0], right: sides[1] };
    },
    (report, write) => {
      write(`Bipartite: ${report.bipartite ? "yes" : "no"}`);
      if (report.left && report.right) {
        write(`Left: ${renderKeys(report.left).join(", ")}`);
        write(`Right: ${renderKeys(report.right).join(", ")}`);
      }
    },
  ),
  components: defineAnalysis(
    0,
    "no arguments",
    ({ graph }) => connectedComponents(graph),
    (components, write) => {
      write("Components:");
      components.forEach((component, index) => write(`  ${index + 1}. ${renderKeys(component).join(", ")}`));
    },
  ),
  cycles: defineAnalysis(
    0,
    "no arguments",
    ({ graph, config }) => detectCycles(graph, config.cycleReportLimit),
    (report, write) => {
      write(`Has cycle: ${report.hasCycle ? "yes" : "no"}`);
      report.cycles.forEach((cycle, index) => write(`  ${index + 1}. ${renderKeys(cycle).join(" -> ")}`));
    },
  ),
};

function lookupHandler(name: string): AnalysisHandler {
  const handler = Object.prototype.hasOwnProperty.call(analysisHandlers, name) ? analysisHandlers[name] : undefined;
  if (!handler) {
    throw new Error(`Unknown analysis '${name}'`);
  }
  return handler;
}

function parseArgs(argv: string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new Error("First positional argument must be the path to a graph file");
  }
  const analyses: CliAnalysis[] = [];
  let format: OutputFormat | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--analysis": {
        const name = rest[++i];
        if (!name || name.startsWith("--")) {
          throw new Error("--analysis expects a name");
        }
        const args: string[] = [];
        while (i + 1 < rest.length && !rest[i + 1].startsWith("--")) {
          args.push(rest[++i]);
        }
        analyses.push({ name, args });
        break;
      }
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new Error("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      default:
        throw new Error(`Unknown argument '${token}'`);
    }
  }

  return {
    file,
    analyses,
    ...(format === undefined ? {} : { format }),
  };
}

function printUsage(write: Write): void {
  write("Usage: graph-walk <file> [--analysis name arg1 arg2 ...]... [--format json|text]");
  write(`Analyses: ${Object.keys(analysisHandlers).join(", ")}`);
  write("Examples:");
  write("  graph-walk routes.txt --analysis bfs A");
  write("  graph-walk routes.json --analysis topologicalSort --format json");
}

/** Renders an error for stderr; graph errors are prefixed with their code. */
export function describeFailure(error: unknown): string {
  if (error instanceof GraphError) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }
  try {
    return fileURLToPath(import.meta.url) === realpathSync(executedFromCli);
  } catch {
    return false;
  }
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    console.error(describeFailure(error));
    process.exitCode = 1;
  });
}

/**
 * Exposes internal helpers for the test suite without making them part of
 * the runtime API surface.
 */
export const __testing = {
  parseArgs,
  resolveKey,
  toJson,
};
