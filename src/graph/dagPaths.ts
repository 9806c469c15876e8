import { MetricsRecorder, type AlgorithmMetrics } from "../metrics.js";
import {
  DistanceOverflowError,
  InvalidTopologicalOrderError,
  NodeOutOfRangeError,
  PathStateError,
} from "./errors.js";
import type { Graph } from "./model.js";

/**
 * Distance from the source, or `null` when the node cannot be reached. The
 * marker stands for +∞ in shortest-path runs and −∞ in longest-path runs and
 * never takes part in arithmetic.
 */
export type Distance = number | null;

export type PathMode = "shortest" | "longest";

export interface PathComputation {
  readonly mode: PathMode;
  readonly source: number;
  readonly distances: readonly Distance[];
  /** Predecessor on the best known path, `null` for the source and unreachable nodes. */
  readonly predecessors: readonly (number | null)[];
  readonly metrics: AlgorithmMetrics;
}

export interface CriticalPath {
  readonly length: number;
  /** Node ids from the source to the farthest node; empty when nothing lies beyond the source. */
  readonly path: readonly number[];
}

export interface CriticalPathResult extends CriticalPath {
  readonly distances: readonly Distance[];
  readonly metrics: AlgorithmMetrics;
}

/**
 * Single-source shortest and longest paths over a DAG, relaxing edges in
 * topological order. The finder remembers its most recent computation so that
 * {@link reconstructPath} can walk the predecessor links.
 */
export class DagPathFinder {
  private last: PathComputation | null = null;

  constructor(private readonly graph: Graph) {}

  shortestPaths(source: number, order: readonly number[]): PathComputation {
    return this.compute("shortest", source, order);
  }

  longestPaths(source: number, order: readonly number[]): PathComputation {
    return this.compute("longest", source, order);
  }

  /**
   * Path from the source of the latest computation to `target`, or an empty
   * list when `target` was not reached.
   */
  reconstructPath(target: number): number[] {
    const last = this.last;
    if (!last) {
      throw new PathStateError();
    }
    if (!this.graph.hasNode(target)) {
      throw new NodeOutOfRangeError(target, this.graph.nodeCount(), "Target node");
    }
    if (last.distances[target] === null) {
      return [];
    }

    const path: number[] = [];
    for (let at: number | null = target; at !== null; at = last.predecessors[at]) {
      path.push(at);
    }
    return path.reverse();
  }

  /**
   * Longest path from `source` to the farthest reachable node. Ties go to the
   * lowest node id. When the source itself is the farthest node the result is
   * `{ length: 0, path: [] }` rather than the single-node path `[source]`.
   */
  findCriticalPath(source: number, order: readonly number[]): CriticalPathResult {
    const computation = this.longestPaths(source, order);

    let farthest = -1;
    let maxDistance = 0;
    computation.distances.forEach((distance, node) => {
      if (distance !== null && (farthest === -1 || distance > maxDistance)) {
        farthest = node;
        maxDistance = distance;
      }
    });

    const base = { distances: computation.distances, metrics: computation.metrics };
    if (farthest === -1 || farthest === source) {
      return { length: 0, path: [], ...base };
    }
    return { length: maxDistance, path: this.reconstructPath(farthest), ...base };
  }

  /** Latest computation, if any. */
  lastComputation(): PathComputation | null {
    return this.last;
  }

  private compute(mode: PathMode, source: number, order: readonly number[]): PathComputation {
    const n = this.graph.nodeCount();
    if (!this.graph.hasNode(source)) {
      throw new NodeOutOfRangeError(source, n, "Source node");
    }
    if (order.length !== n) {
      throw new InvalidTopologicalOrderError(
        `Invalid topological order: expected ${n} nodes but received ${order.length}, graph may contain cycles`,
      );
    }
    const sourceIndex = order.indexOf(source);
    if (sourceIndex === -1) {
      throw new InvalidTopologicalOrderError(`Source node ${source} not found in topological order`);
    }

    const recorder = new MetricsRecorder();
    const distances = new Array<Distance>(n).fill(null);
    const predecessors = new Array<number | null>(n).fill(null);
    distances[source] = 0;

    const improves =
      mode === "shortest"
        ? (candidate: number, current: number) => candidate < current
        : (candidate: number, current: number) => candidate > current;

    for (let index = sourceIndex; index < order.length; index++) {
      const node = order[index];
      const base = distances[node];
      if (base === null) {
        continue;
      }
      for (const edge of this.graph.neighbors(node)) {
        recorder.increment("relaxOperations");
        const candidate = base + edge.weight;
        if (!Number.isSafeInteger(candidate)) {
          throw new DistanceOverflowError(source, edge.target);
        }
        const current = distances[edge.target];
        if (current === null || improves(candidate, current)) {
          distances[edge.target] = candidate;
          predecessors[edge.target] = node;
        }
      }
    }

    this.last = { mode, source, distances, predecessors, metrics: recorder.finish() };
    return this.last;
  }
}
