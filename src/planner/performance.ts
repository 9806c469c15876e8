import type { ExecutionPlan } from "./pipeline.js";

/** Timing and operation counts of one planned graph. */
export interface PerformanceResult {
  readonly name: string;
  readonly nodeCount: number;
  readonly edgeCount: number;
  readonly componentCount: number;
  /** True when the original graph has neither a multi-task component nor a self-loop. */
  readonly acyclic: boolean;
  readonly sccTimeMs: number;
  readonly sccOperations: number;
  readonly topoTimeMs: number;
  readonly topoOperations: number;
  readonly pathTimeMs: number;
  readonly pathOperations: number;
  readonly totalTimeMs: number;
}

export function summarisePerformance(plan: ExecutionPlan): PerformanceResult {
  const { scc, topologicalSort, shortestPaths, longestPaths } = plan.metrics;
  const pathTimeMs = shortestPaths.elapsedMs + longestPaths.elapsedMs;
  return {
    name: plan.name,
    nodeCount: plan.stats.nodeCount,
    edgeCount: plan.stats.edgeCount,
    componentCount: plan.components.length,
    acyclic: plan.cyclicComponentCount === 0 && plan.stats.selfLoops === 0,
    sccTimeMs: scc.elapsedMs,
    sccOperations: scc.dfsVisits + scc.edgeTraversals,
    topoTimeMs: topologicalSort.elapsedMs,
    topoOperations: topologicalSort.queuePushes + topologicalSort.queuePops,
    pathTimeMs,
    pathOperations: shortestPaths.relaxOperations + longestPaths.relaxOperations,
    totalTimeMs: scc.elapsedMs + topologicalSort.elapsedMs + pathTimeMs,
  };
}

/**
 * Collects per-graph results across a run so graphs of different sizes can be
 * compared once every file has been processed.
 */
export class PerformanceAnalyzer {
  private readonly results: PerformanceResult[] = [];

  record(plan: ExecutionPlan): PerformanceResult {
    const result = summarisePerformance(plan);
    this.results.push(result);
    return result;
  }

  list(): readonly PerformanceResult[] {
    return [...this.results];
  }

  /** Results sorted by total operation count, heaviest first. */
  rankByOperations(): PerformanceResult[] {
    return [...this.results].sort((left, right) => totalOperations(right) - totalOperations(left));
  }

  formatReport(): string {
    const lines = ["PERFORMANCE ANALYSIS REPORT"];
    for (const result of this.results) {
      lines.push(
        "",
        `Graph: ${result.name}`,
        `  Size: ${result.nodeCount} nodes, ${result.edgeCount} edges`,
        `  SCC: ${formatMs(result.sccTimeMs)}, ${result.componentCount} components, ${result.sccOperations} operations`,
        `  Topo: ${formatMs(result.topoTimeMs)}, ${result.acyclic ? "DAG" : "Cyclic"}, ${result.topoOperations} queue operations`,
        `  Path: ${formatMs(result.pathTimeMs)}, ${result.pathOperations} relaxations`,
        `  Total: ${formatMs(result.totalTimeMs)}`,
      );
    }
    return lines.join("\n");
  }
}

function totalOperations(result: PerformanceResult): number {
  return result.sccOperations + result.topoOperations + result.pathOperations;
}

function formatMs(value: number): string {
  return `${value.toFixed(3)}ms`;
}
