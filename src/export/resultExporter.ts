import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { Distance } from "../graph/dagPaths.js";
import type { StructuredLogger } from "../logger.js";
import { summarisePerformance, type PerformanceResult } from "../planner/performance.js";
import type { ExecutionPlan } from "../planner/pipeline.js";
import { ERROR_CODES } from "../types.js";

/** Marker written in place of a distance that was never reached. */
export const UNREACHABLE_LABEL = "UNREACHABLE";

/** Error raised when an export file cannot be written. */
export class ExportError extends Error {
  public readonly code: typeof ERROR_CODES.EXPORT_WRITE_FAILED;
  public readonly details: { file: string };

  constructor(file: string, cause: unknown) {
    super(`failed to write '${file}': ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "ExportError";
    this.code = ERROR_CODES.EXPORT_WRITE_FAILED;
    this.details = { file };
  }
}

function displayDistance(distance: Distance): number | string {
  return distance === null ? UNREACHABLE_LABEL : distance;
}

function csvCell(value: string | number | boolean): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvRow(values: Array<string | number | boolean>): string {
  return values.map(csvCell).join(",");
}

function csvDocument(header: string[], rows: Array<Array<string | number | boolean>>): string {
  return [header.join(","), ...rows.map(csvRow)].join("\n") + "\n";
}

/** Base name used for every file of a plan: `small_dag.json` becomes `small_dag`. */
export function exportBaseName(planName: string): string {
  return path.basename(planName).replace(/\.json$/i, "");
}

/** JSON document describing a full plan. */
export function buildPlanDocument(plan: ExecutionPlan): Record<string, unknown> {
  return {
    filename: plan.name,
    node_count: plan.stats.nodeCount,
    edge_count: plan.stats.edgeCount,
    source: plan.source,
    source_component: plan.sourceComponent,
    has_cycles: plan.cyclicComponentCount > 0,
    components: plan.components.map((nodes, id) => ({ id, size: nodes.length, nodes })),
    condensation_edges: plan.condensationEdges,
    component_order: plan.componentOrder,
    task_order: plan.taskOrder,
    shortest_distances: plan.shortestDistances.map(displayDistance),
    longest_distances: plan.longestDistances.map(displayDistance),
    critical_path: {
      length: plan.criticalPath.length,
      path: plan.criticalPath.path,
      task_path: plan.criticalPath.taskPath,
    },
    metrics: {
      scc: plan.metrics.scc,
      topological_sort: plan.metrics.topologicalSort,
      shortest_paths: plan.metrics.shortestPaths,
      longest_paths: plan.metrics.longestPaths,
      total: plan.metrics.total,
    },
  };
}

export function buildComponentsCsv(plan: ExecutionPlan): string {
  return csvDocument(
    ["component_id", "size", "node_list", "is_cycle"],
    plan.components.map((nodes, id) => [id, nodes.length, nodes.join(" "), nodes.length > 1]),
  );
}

export function buildPathsCsv(plan: ExecutionPlan): string {
  return csvDocument(
    ["component_id", "shortest_distance", "longest_distance", "reachable", "is_source_component"],
    plan.shortestDistances.map((shortest, id) => {
      const longest = plan.longestDistances[id] ?? null;
      return [
        id,
        displayDistance(shortest),
        displayDistance(longest),
        shortest !== null,
        id === plan.sourceComponent,
      ];
    }),
  );
}

export function buildMetricsCsv(plan: ExecutionPlan): string {
  const result = summarisePerformance(plan);
  const shared = [result.componentCount, plan.source, !result.acyclic, plan.criticalPath.length];
  return csvDocument(
    ["algorithm", "time_ms", "operations", "components", "source", "has_cycles", "critical_path_length"],
    [
      ["SCC", result.sccTimeMs.toFixed(3), result.sccOperations, ...shared],
      ["TopologicalSort", result.topoTimeMs.toFixed(3), result.topoOperations, ...shared],
      ["PathFinding", result.pathTimeMs.toFixed(3), result.pathOperations, ...shared],
      [
        "TOTAL",
        result.totalTimeMs.toFixed(3),
        result.sccOperations + result.topoOperations + result.pathOperations,
        ...shared,
      ],
    ],
  );
}

export function buildSummaryCsv(results: readonly PerformanceResult[]): string {
  return csvDocument(
    ["filename", "nodes", "edges", "components", "scc_time_ms", "topo_time_ms", "path_time_ms", "total_time_ms", "has_cycles"],
    results.map((result) => [
      result.name,
      result.nodeCount,
      result.edgeCount,
      result.componentCount,
      result.sccTimeMs.toFixed(3),
      result.topoTimeMs.toFixed(3),
      result.pathTimeMs.toFixed(3),
      result.totalTimeMs.toFixed(3),
      !result.acyclic,
    ]),
  );
}

/** Aggregated statistics over every processed graph. */
export function buildSummaryDocument(results: readonly PerformanceResult[]): Record<string, unknown> {
  const count = results.length;
  const average = (pick: (result: PerformanceResult) => number): number =>
    count === 0 ? 0 : results.reduce((sum, result) => sum + pick(result), 0) / count;
  const dagCount = results.filter((result) => result.acyclic).length;
  return {
    total_datasets: count,
    datasets: results.map((result) => ({
      filename: result.name,
      nodes: result.nodeCount,
      edges: result.edgeCount,
      components: result.componentCount,
      has_cycles: !result.acyclic,
      total_time_ms: result.totalTimeMs,
    })),
    statistics: {
      average_nodes: average((result) => result.nodeCount),
      average_edges: average((result) => result.edgeCount),
      average_components: average((result) => result.componentCount),
      average_total_time_ms: average((result) => result.totalTimeMs),
      dag_count: dagCount,
      cyclic_count: count - dagCount,
      dag_percentage: count === 0 ? 0 : (dagCount * 100) / count,
    },
  };
}

/**
 * Writes plans under `<baseDir>/json` and `<baseDir>/csv`, and run summaries
 * directly under `<baseDir>`.
 */
export class ResultExporter {
  constructor(
    private readonly baseDir: string,
    private readonly logger?: StructuredLogger,
  ) {}

  resultsDirectory(): string {
    return this.baseDir;
  }

  /** Writes the JSON document and the three CSV files of a plan; returns their paths. */
  async exportPlan(plan: ExecutionPlan): Promise<string[]> {
    const baseName = exportBaseName(plan.name);
    const jsonDir = path.join(this.baseDir, "json");
    const csvDir = path.join(this.baseDir, "csv");
    const files: Array<[string, string]> = [
      [path.join(jsonDir, `${baseName}_full.json`), `${JSON.stringify(buildPlanDocument(plan), null, 2)}\n`],
      [path.join(csvDir, `${baseName}_metrics.csv`), buildMetricsCsv(plan)],
      [path.join(csvDir, `${baseName}_components.csv`), buildComponentsCsv(plan)],
      [path.join(csvDir, `${baseName}_paths.csv`), buildPathsCsv(plan)],
    ];
    await this.ensureDirectory(jsonDir);
    await this.ensureDirectory(csvDir);
    for (const [file, contents] of files) {
      await this.write(file, contents);
    }
    this.logger?.info("plan_exported", { graph: plan.name, files: files.map(([file]) => file) });
    return files.map(([file]) => file);
  }

  /** Writes `summary.csv` and `summary.json`; returns their paths. */
  async exportSummary(results: readonly PerformanceResult[]): Promise<string[]> {
    await this.ensureDirectory(this.baseDir);
    const csvFile = path.join(this.baseDir, "summary.csv");
    const jsonFile = path.join(this.baseDir, "summary.json");
    await this.write(csvFile, buildSummaryCsv(results));
    await this.write(jsonFile, `${JSON.stringify(buildSummaryDocument(results), null, 2)}\n`);
    this.logger?.info("summary_exported", { datasets: results.length });
    return [csvFile, jsonFile];
  }

  private async ensureDirectory(directory: string): Promise<void> {
    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new ExportError(directory, error);
    }
  }

  private async write(file: string, contents: string): Promise<void> {
    try {
      await writeFile(file, contents, "utf8");
    } catch (error) {
      throw new ExportError(file, error);
    }
  }
}
