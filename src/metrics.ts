import { performance } from "node:perf_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/**
 * Work performed by a single algorithm run. Every operation of the graph
 * engine returns its own snapshot alongside the result so counters never
 * leak from one run into another.
 */
export interface AlgorithmMetrics {
  readonly dfsVisits: number;
  readonly edgeTraversals: number;
  readonly queuePushes: number;
  readonly queuePops: number;
  readonly relaxOperations: number;
  /** Wall-clock duration of the run, in milliseconds. */
  readonly elapsedMs: number;
}

type Counter = Exclude<keyof AlgorithmMetrics, "elapsedMs">;

/** Snapshot with every counter at zero, used for runs that did no work. */
export const EMPTY_METRICS: AlgorithmMetrics = Object.freeze({
  dfsVisits: 0,
  edgeTraversals: 0,
  queuePushes: 0,
  queuePops: 0,
  relaxOperations: 0,
  elapsedMs: 0,
});

/**
 * Mutable accumulator owned by exactly one algorithm invocation. Algorithms
 * create a recorder, bump its counters while they run and hand the caller a
 * frozen {@link AlgorithmMetrics} through {@link finish}.
 */
export class MetricsRecorder {
  private readonly counters: Record<Counter, number> = {
    dfsVisits: 0,
    edgeTraversals: 0,
    queuePushes: 0,
    queuePops: 0,
    relaxOperations: 0,
  };
  private readonly startedAt: number;

  constructor(private readonly clock: () => number = () => performance.now()) {
    this.startedAt = clock();
  }

  increment(counter: Counter, amount = 1): void {
    this.counters[counter] += amount;
  }

  finish(): AlgorithmMetrics {
    const elapsedMs = Math.max(0, this.clock() - this.startedAt);
    return Object.freeze({ ...this.counters, elapsedMs });
  }
}

/** Sums several snapshots, e.g. the stages of one pipeline run. */
export function combineMetrics(...snapshots: AlgorithmMetrics[]): AlgorithmMetrics {
  return Object.freeze(
    snapshots.reduce<AlgorithmMetrics>(
      (total, entry) => ({
        dfsVisits: total.dfsVisits + entry.dfsVisits,
        edgeTraversals: total.edgeTraversals + entry.edgeTraversals,
        queuePushes: total.queuePushes + entry.queuePushes,
        queuePops: total.queuePops + entry.queuePops,
        relaxOperations: total.relaxOperations + entry.relaxOperations,
        elapsedMs: total.elapsedMs + entry.elapsedMs,
      }),
      EMPTY_METRICS,
    ),
  );
}

export function formatMetrics(metrics: AlgorithmMetrics): string {
  return (
    `time=${metrics.elapsedMs.toFixed(3)}ms, dfsVisits=${metrics.dfsVisits}, edges=${metrics.edgeTraversals}, ` +
    `queueOps=(push=${metrics.queuePushes}, pop=${metrics.queuePops}), relax=${metrics.relaxOperations}`
  );
}
