import type { Graph } from "./model.js";

export interface GraphStats {
  readonly nodeCount: number;
  readonly edgeCount: number;
  /** `null` when the graph has no edge. */
  readonly minWeight: number | null;
  readonly maxWeight: number | null;
  readonly density: number;
  readonly selfLoops: number;
}

/**
 * Ratio of present edges to the maximum possible count. Parallel edges are
 * counted individually, so multigraphs may exceed 1.
 */
export function calculateDensity(graph: Graph): number {
  const n = graph.nodeCount();
  if (n <= 1) {
    return 0;
  }
  const maxEdges = graph.isDirected() ? n * (n - 1) : (n * (n - 1)) / 2;
  return graph.edgeCount() / maxEdges;
}

export function hasSelfLoops(graph: Graph): boolean {
  return countSelfLoops(graph) > 0;
}

function countSelfLoops(graph: Graph): number {
  let loops = 0;
  for (let node = 0; node < graph.nodeCount(); node++) {
    for (const edge of graph.neighbors(node)) {
      if (edge.target === node) {
        loops++;
      }
    }
  }
  return loops;
}

export function getGraphStats(graph: Graph): GraphStats {
  let minWeight: number | null = null;
  let maxWeight: number | null = null;
  for (const edge of graph.listEdges()) {
    minWeight = minWeight === null ? edge.weight : Math.min(minWeight, edge.weight);
    maxWeight = maxWeight === null ? edge.weight : Math.max(maxWeight, edge.weight);
  }
  return {
    nodeCount: graph.nodeCount(),
    edgeCount: graph.edgeCount(),
    minWeight,
    maxWeight,
    density: calculateDensity(graph),
    selfLoops: countSelfLoops(graph),
  };
}

export function formatGraphStats(stats: GraphStats): string {
  const weights = stats.minWeight === null ? "[]" : `[${stats.minWeight},${stats.maxWeight}]`;
  return `GraphStats{nodes=${stats.nodeCount}, edges=${stats.edgeCount}, weight=${weights}, density=${stats.density.toFixed(3)}}`;
}
