import { MetricsRecorder, type AlgorithmMetrics } from "../metrics.js";
import type { Graph } from "./model.js";
import type { SccResult, StronglyConnectedComponent } from "./scc.js";

export interface TopologicalOrderResult {
  /** Node ids in a valid execution order, or empty when the graph has a cycle. */
  readonly order: readonly number[];
  readonly metrics: AlgorithmMetrics;
}

/**
 * Kahn's algorithm. A cycle is reported through an empty order rather than an
 * exception, so callers must check the length before using it. An empty graph
 * also yields an empty order even though it has no cycle.
 */
export function topologicalOrder(graph: Graph): TopologicalOrderResult {
  const recorder = new MetricsRecorder();
  const n = graph.nodeCount();
  const indegree = new Array<number>(n).fill(0);
  for (let node = 0; node < n; node++) {
    for (const edge of graph.neighbors(node)) {
      indegree[edge.target]++;
    }
  }

  // Array-backed FIFO: `head` advances instead of shifting.
  const queue: number[] = [];
  let head = 0;
  for (let node = 0; node < n; node++) {
    if (indegree[node] === 0) {
      queue.push(node);
      recorder.increment("queuePushes");
    }
  }

  const order: number[] = [];
  while (head < queue.length) {
    const current = queue[head++];
    recorder.increment("queuePops");
    order.push(current);
    for (const edge of graph.neighbors(current)) {
      indegree[edge.target]--;
      if (indegree[edge.target] === 0) {
        queue.push(edge.target);
        recorder.increment("queuePushes");
      }
    }
  }

  const metrics = recorder.finish();
  return { order: order.length === n ? order : [], metrics };
}

/** Recomputes the order; nothing is cached between calls. */
export function isDag(graph: Graph): boolean {
  return topologicalOrder(graph).order.length > 0;
}

/** Orders the condensation graph of an SCC result. */
export function topologicalOrderOfComponents(scc: SccResult): TopologicalOrderResult {
  return topologicalOrder(scc.condensation);
}

/** Flattens a component order into the task execution order. */
export function expandTaskOrder(
  componentOrder: readonly number[],
  components: readonly StronglyConnectedComponent[],
): number[] {
  return componentOrder.flatMap((componentId) => components[componentId] ?? []);
}
