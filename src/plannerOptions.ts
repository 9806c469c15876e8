import { readBool, readEnum, readInt, readOptionalString, readString } from "./config/env.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

/** Output format of the command line report. */
export type ReportFormat = "text" | "json";

/**
 * Runtime configuration of the planner, resolved from the environment and
 * then overridden by CLI flags.
 */
export interface PlannerOptions {
  /** Minimum level of emitted log entries. */
  logLevel: LogLevel;
  /** Optional file mirroring the JSON log lines. */
  logFile: string | null;
  /** Rotation threshold of {@link logFile}, in bytes. */
  logMaxFileSizeBytes: number;
  /** Directory receiving the JSON and CSV exports. */
  resultsDir: string;
  /** Whether plans are exported after each processed file. */
  exportResults: boolean;
  /** Directory used to resolve relative descriptor paths. */
  dataDir: string;
  /** Overrides the descriptor's source node when set. */
  sourceOverride: number | null;
  format: ReportFormat;
}

const DEFAULT_LOG_MAX_BYTES = 5 * 1024 * 1024;

export function resolvePlannerOptions(): PlannerOptions {
  return {
    logLevel: readEnum<LogLevel>("PLANNER_LOG_LEVEL", LOG_LEVELS, "info"),
    logFile: readOptionalString("PLANNER_LOG_FILE") ?? null,
    logMaxFileSizeBytes: readInt("PLANNER_LOG_MAX_BYTES", DEFAULT_LOG_MAX_BYTES, { min: 1 }),
    resultsDir: readString("PLANNER_RESULTS_DIR", "results"),
    exportResults: readBool("PLANNER_EXPORT", true),
    dataDir: readString("PLANNER_DATA_DIR", "data"),
    sourceOverride: null,
    format: "text",
  };
}
