import process from "node:process";
import path from "node:path";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { ResultExporter, buildPlanDocument } from "./export/resultExporter.js";
import { loadGraphDescriptor } from "./graph/descriptor.js";
import { StructuredLogger } from "./logger.js";
import { PerformanceAnalyzer } from "./planner/performance.js";
import { planFromDescriptor, type ExecutionPlan } from "./planner/pipeline.js";
import { formatPlanReport } from "./planner/report.js";
import { resolvePlannerOptions, type PlannerOptions, type ReportFormat } from "./plannerOptions.js";
import { summariseError } from "./types.js";

interface CliOptions {
  readonly files: string[];
  readonly format?: ReportFormat;
  readonly resultsDir?: string;
  readonly dataDir?: string;
  readonly exportResults?: boolean;
  readonly source?: number;
}

function parseArgs(argv: string[]): CliOptions {
  const files: string[] = [];
  let format: ReportFormat | undefined;
  let resultsDir: string | undefined;
  let dataDir: string | undefined;
  let exportResults: boolean | undefined;
  let source: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case "--format": {
        const value = argv[++i];
        if (value !== "json" && value !== "text") {
          throw new Error("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--results-dir": {
        const value = argv[++i];
        if (!value) {
          throw new Error("--results-dir expects a directory");
        }
        resultsDir = value;
        break;
      }
      case "--data-dir": {
        const value = argv[++i];
        if (!value) {
          throw new Error("--data-dir expects a directory");
        }
        dataDir = value;
        break;
      }
      case "--source": {
        const value = argv[++i];
        if (!value || !/^\d+$/.test(value)) {
          throw new Error("--source expects a non-negative integer");
        }
        source = Number.parseInt(value, 10);
        break;
      }
      case "--no-export":
        exportResults = false;
        break;
      case "--export":
        exportResults = true;
        break;
      default:
        if (token.startsWith("--")) {
          throw new Error(`Unknown argument '${token}'`);
        }
        files.push(token);
    }
  }

  if (files.length === 0) {
    throw new Error("At least one graph descriptor file is required");
  }

  return {
    files,
    ...(format === undefined ? {} : { format }),
    ...(resultsDir === undefined ? {} : { resultsDir }),
    ...(dataDir === undefined ? {} : { dataDir }),
    ...(exportResults === undefined ? {} : { exportResults }),
    ...(source === undefined ? {} : { source }),
  };
}

/** CLI flags win over the environment. */
function mergeOptions(base: PlannerOptions, cli: CliOptions): PlannerOptions {
  return {
    ...base,
    format: cli.format ?? base.format,
    resultsDir: cli.resultsDir ?? base.resultsDir,
    dataDir: cli.dataDir ?? base.dataDir,
    exportResults: cli.exportResults ?? base.exportResults,
    sourceOverride: cli.source ?? base.sourceOverride,
  };
}

/**
 * Bare file names are looked up in the data directory; anything carrying a
 * directory component is resolved from the working directory.
 */
function resolveDescriptorPath(file: string, dataDir: string): string {
  if (path.isAbsolute(file)) {
    return file;
  }
  if (path.basename(file) === file) {
    return path.resolve(dataDir, file);
  }
  return path.resolve(file);
}

/** Processes every file and returns the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  const cli = parseArgs(argv);
  const options = mergeOptions(resolvePlannerOptions(), cli);
  const logger = new StructuredLogger({
    // Keeps stdout a single JSON document in json mode.
    stream: options.format === "json" ? process.stderr : process.stdout,
    level: options.logLevel,
    logFile: options.logFile,
    maxFileSizeBytes: options.logMaxFileSizeBytes,
  });
  const exporter = options.exportResults ? new ResultExporter(options.resultsDir, logger) : null;
  const analyzer = new PerformanceAnalyzer();
  const plans: ExecutionPlan[] = [];
  let failures = 0;

  for (const file of cli.files) {
    const descriptorPath = resolveDescriptorPath(file, options.dataDir);
    try {
      const descriptor = await loadGraphDescriptor(descriptorPath);
      const plan = planFromDescriptor(path.basename(file), descriptor, {
        logger,
        sourceOverride: options.sourceOverride,
      });
      analyzer.record(plan);
      plans.push(plan);
      if (options.format === "text") {
        console.log(formatPlanReport(plan));
        console.log("");
      }
      await exporter?.exportPlan(plan);
    } catch (error) {
      failures++;
      logger.error("graph_processing_failed", { file: descriptorPath, ...summariseError(error) });
    }
  }

  if (options.format === "json") {
    console.log(
      JSON.stringify({ plans: plans.map(buildPlanDocument), performance: analyzer.list() }, null, 2),
    );
  } else if (plans.length > 0) {
    console.log(analyzer.formatReport());
  }

  if (exporter && plans.length > 0) {
    await exporter.exportSummary(analyzer.list());
  }
  logger.info("run_completed", { processed: plans.length, failed: failures });
  await logger.flush();
  return failures > 0 ? 1 : 0;
}

function printUsage(): void {
  console.log(
    "Usage: task-planner <graph.json> [more.json ...] [--format text|json] [--source id] " +
      "[--results-dir dir] [--data-dir dir] [--no-export]\n",
  );
  console.log("Examples:");
  console.log("  task-planner small_dag.json");
  console.log("  task-planner ./graphs/city.json --source 3 --format json --no-export");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  return thisModulePath === executedFromCli;
})();

if (isCliEntryPoint) {
  const argv = process.argv.slice(2);
  if (argv.length === 0) {
    printUsage();
    process.exit(1);
  }
  runCli(argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
}

/**
 * Exposes internal helpers for the test suite without exporting them as part
 * of the runtime API surface.
 */
export const __testing = {
  mergeOptions,
  parseArgs,
  resolveDescriptorPath,
};
