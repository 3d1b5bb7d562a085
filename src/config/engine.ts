import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readEnum, readInt, readOptionalString } from "./env.js";

export type OutputFormat = "text" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

/** Runtime settings shared by the CLI and the loaders. */
export interface EngineConfig {
  readonly logLevel: LogLevel;
  readonly logFile?: string;
  readonly defaultFormat: OutputFormat;
  /** Maximum number of cycles reported by the `cycles` analysis. */
  readonly cycleReportLimit: number;
}

export const DEFAULT_CYCLE_REPORT_LIMIT = 20;

/** Resolves {@link EngineConfig} from the `GRAPH_WALK_*` environment variables. */
export function loadEngineConfig(): EngineConfig {
  const logFile = readOptionalString("GRAPH_WALK_LOG_FILE");
  return {
    logLevel: readEnum("GRAPH_WALK_LOG_LEVEL", LOG_LEVELS, "warn"),
    defaultFormat: readEnum("GRAPH_WALK_FORMAT", OUTPUT_FORMATS, "text"),
    cycleReportLimit: readInt("GRAPH_WALK_CYCLE_LIMIT", DEFAULT_CYCLE_REPORT_LIMIT, { min: 1, max: 1_000 }),
    ...(logFile === undefined ? {} : { logFile }),
  };
}
