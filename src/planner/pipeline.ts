import { combineMetrics, EMPTY_METRICS, type AlgorithmMetrics } from "../metrics.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES } from "../types.js";
import { DagPathFinder, type Distance } from "../graph/dagPaths.js";
import { createGraphFromDescriptor, type GraphDescriptor } from "../graph/descriptor.js";
import { NodeOutOfRangeError, UnsupportedGraphError } from "../graph/errors.js";
import type { Graph, WeightedEdge } from "../graph/model.js";
import { findStronglyConnectedComponents, type StronglyConnectedComponent } from "../graph/scc.js";
import { getGraphStats, type GraphStats } from "../graph/stats.js";
import { expandTaskOrder, topologicalOrder } from "../graph/topologicalSort.js";

/**
 * Error thrown when the pipeline reaches a state its stages guarantee cannot
 * happen, such as a cyclic condensation graph.
 */
export class PlanningError extends Error {
  public readonly code: typeof ERROR_CODES.PLAN_CYCLIC_CONDENSATION;
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "PlanningError";
    this.code = ERROR_CODES.PLAN_CYCLIC_CONDENSATION;
    this.details = details;
  }
}

export interface PlanMetrics {
  readonly scc: AlgorithmMetrics;
  readonly topologicalSort: AlgorithmMetrics;
  readonly shortestPaths: AlgorithmMetrics;
  readonly longestPaths: AlgorithmMetrics;
  readonly total: AlgorithmMetrics;
}

export interface PlannedCriticalPath {
  readonly length: number;
  /** Component ids along the path. */
  readonly path: readonly number[];
  /** Task ids of those components, in path order. */
  readonly taskPath: readonly number[];
}

/** Everything the planner derives from one task graph. */
export interface ExecutionPlan {
  readonly name: string;
  /** Source task id. */
  readonly source: number;
  readonly stats: GraphStats;
  readonly components: readonly StronglyConnectedComponent[];
  readonly componentIds: readonly number[];
  readonly cyclicComponentCount: number;
  readonly condensationEdges: readonly WeightedEdge[];
  readonly componentOrder: readonly number[];
  readonly taskOrder: readonly number[];
  /** Component holding the source task, `null` for an empty graph. */
  readonly sourceComponent: number | null;
  /** Indexed by component id. */
  readonly shortestDistances: readonly Distance[];
  readonly longestDistances: readonly Distance[];
  readonly criticalPath: PlannedCriticalPath;
  readonly metrics: PlanMetrics;
}

export interface PlanInput {
  readonly name: string;
  readonly graph: Graph;
  readonly source: number;
}

export interface PlanOptions {
  readonly logger?: StructuredLogger;
}

/**
 * Runs the full pipeline: SCC detection and condensation, topological ordering
 * of the condensation, then shortest/longest paths from the component that
 * holds the source task.
 */
export function planExecution(input: PlanInput, options: PlanOptions = {}): ExecutionPlan {
  const { graph, name, source } = input;
  const logger = options.logger?.child({ graph: name });

  if (!graph.isDirected()) {
    throw new UnsupportedGraphError(`graph '${name}' is undirected; only directed graphs can be planned`);
  }
  const n = graph.nodeCount();
  // An empty graph has no source task; 0 stands in as the placeholder.
  if (!graph.hasNode(source) && (n > 0 || source !== 0)) {
    throw new NodeOutOfRangeError(source, n, "Source node");
  }
  const stats = getGraphStats(graph);

  const scc = findStronglyConnectedComponents(graph);
  const cyclicComponentCount = scc.components.filter((component) => component.length > 1).length;
  logger?.debug("scc_completed", {
    components: scc.components.length,
    cyclic_components: cyclicComponentCount,
    metrics: scc.metrics,
  });

  const topo = topologicalOrder(scc.condensation);
  // An empty order only means "cycle" when there was something to order.
  if (topo.order.length === 0 && scc.components.length > 0) {
    logger?.error("cycle_detected_in_condensation", { components: scc.components.length });
    throw new PlanningError(`condensation of graph '${name}' is not acyclic`, {
      components: scc.components.length,
    });
  }
  logger?.debug("topological_sort_completed", { order: topo.order, metrics: topo.metrics });

  const base = {
    name,
    source,
    stats,
    components: scc.components,
    componentIds: scc.componentIds,
    cyclicComponentCount,
    condensationEdges: scc.condensation.listEdges(),
    componentOrder: topo.order,
    taskOrder: expandTaskOrder(topo.order, scc.components),
  };

  if (n === 0) {
    logger?.info("plan_completed", { components: 0, critical_path_length: 0 });
    return {
      ...base,
      sourceComponent: null,
      shortestDistances: [],
      longestDistances: [],
      criticalPath: { length: 0, path: [], taskPath: [] },
      metrics: {
        scc: scc.metrics,
        topologicalSort: topo.metrics,
        shortestPaths: EMPTY_METRICS,
        longestPaths: EMPTY_METRICS,
        total: combineMetrics(scc.metrics, topo.metrics),
      },
    };
  }

  const sourceComponent = scc.componentIds[source];
  const finder = new DagPathFinder(scc.condensation);
  const shortest = finder.shortestPaths(sourceComponent, topo.order);
  const critical = finder.findCriticalPath(sourceComponent, topo.order);
  logger?.debug("paths_completed", {
    source_component: sourceComponent,
    shortest_metrics: shortest.metrics,
    longest_metrics: critical.metrics,
  });

  const criticalPath: PlannedCriticalPath = {
    length: critical.length,
    path: critical.path,
    taskPath: expandTaskOrder(critical.path, scc.components),
  };
  logger?.info("plan_completed", {
    components: scc.components.length,
    critical_path_length: criticalPath.length,
  });

  return {
    ...base,
    sourceComponent,
    shortestDistances: shortest.distances,
    longestDistances: critical.distances,
    criticalPath,
    metrics: {
      scc: scc.metrics,
      topologicalSort: topo.metrics,
      shortestPaths: shortest.metrics,
      longestPaths: critical.metrics,
      total: combineMetrics(scc.metrics, topo.metrics, shortest.metrics, critical.metrics),
    },
  };
}

/**
 * Builds the graph described by `descriptor` and plans it. `sourceOverride`
 * replaces the descriptor's source when provided.
 */
export function planFromDescriptor(
  name: string,
  descriptor: GraphDescriptor,
  options: PlanOptions & { readonly sourceOverride?: number | null } = {},
): ExecutionPlan {
  const graph = createGraphFromDescriptor(descriptor);
  const source = options.sourceOverride ?? descriptor.source;
  return planExecution({ name, graph, source }, options);
}
