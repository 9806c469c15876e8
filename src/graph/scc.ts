import { MetricsRecorder, type AlgorithmMetrics } from "../metrics.js";
import { Graph } from "./model.js";

/** Node ids of one strongly connected component, in discovery order. */
export type StronglyConnectedComponent = readonly number[];

export interface SccResult {
  /** Components indexed by component id. */
  readonly components: readonly StronglyConnectedComponent[];
  /** `componentIds[node]` is the id of the component containing `node`. */
  readonly componentIds: readonly number[];
  /** One node per component, at most one edge per ordered component pair. */
  readonly condensation: Graph;
  readonly metrics: AlgorithmMetrics;
}

/** DFS frame: the node being explored and the next outgoing edge to examine. */
interface Frame {
  readonly node: number;
  cursor: number;
}

/**
 * Kosaraju's algorithm. Both passes use an explicit stack so graphs with long
 * chains do not exhaust the call stack.
 */
export function findStronglyConnectedComponents(graph: Graph): SccResult {
  const recorder = new MetricsRecorder();
  const n = graph.nodeCount();
  const visited = new Array<boolean>(n).fill(false);
  const finishOrder: number[] = [];

  for (let node = 0; node < n; node++) {
    if (!visited[node]) {
      explore(graph, node, visited, recorder, (finished) => finishOrder.push(finished), () => {});
    }
  }

  const transposed = graph.transpose();
  visited.fill(false);
  const componentIds = new Array<number>(n).fill(-1);
  const components: number[][] = [];

  while (finishOrder.length > 0) {
    const node = finishOrder.pop();
    if (node === undefined || visited[node]) {
      continue;
    }
    const componentId = components.length;
    const members: number[] = [];
    explore(transposed, node, visited, recorder, () => {}, (reached) => {
      componentIds[reached] = componentId;
      members.push(reached);
    });
    components.push(members);
  }

  const condensation = buildCondensation(graph, components, componentIds);
  return { components, componentIds, condensation, metrics: recorder.finish() };
}

/**
 * Iterative depth-first search from `start`. `onEnter` fires in pre-order,
 * `onFinish` once every outgoing edge of a node has been examined.
 */
function explore(
  graph: Graph,
  start: number,
  visited: boolean[],
  recorder: MetricsRecorder,
  onFinish: (node: number) => void,
  onEnter: (node: number) => void,
): void {
  const stack: Frame[] = [];
  const enter = (node: number): void => {
    visited[node] = true;
    recorder.increment("dfsVisits");
    onEnter(node);
    stack.push({ node, cursor: 0 });
  };

  enter(start);
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const edges = graph.neighbors(frame.node);
    if (frame.cursor < edges.length) {
      const edge = edges[frame.cursor];
      frame.cursor++;
      recorder.increment("edgeTraversals");
      if (!visited[edge.target]) {
        enter(edge.target);
      }
      continue;
    }
    stack.pop();
    onFinish(frame.node);
  }
}

/**
 * Collapses every component into a single node. Parallel inter-component
 * edges are not merged: the first edge seen between two components keeps its
 * weight and later ones are dropped.
 */
export function buildCondensation(
  graph: Graph,
  components: readonly StronglyConnectedComponent[],
  componentIds: readonly number[],
): Graph {
  const condensation = new Graph(components.length, true);
  components.forEach((members, sourceComponent) => {
    const linked = new Set<number>();
    for (const node of members) {
      for (const edge of graph.neighbors(node)) {
        const targetComponent = componentIds[edge.target];
        if (targetComponent !== sourceComponent && !linked.has(targetComponent)) {
          condensation.addEdge(sourceComponent, targetComponent, edge.weight);
          linked.add(targetComponent);
        }
      }
    }
  });
  return condensation.freeze();
}

/** Components with more than one task, i.e. the cyclic task groups. */
export function cyclicComponents(result: SccResult): StronglyConnectedComponent[] {
  return result.components.filter((component) => component.length > 1);
}
