import { GraphFrozenError, InvalidWeightError, NodeOutOfRangeError } from "./errors.js";

/** Outgoing edge stored in an adjacency list. */
export interface GraphEdge {
  readonly target: number;
  readonly weight: number;
}

/** Edge expressed with both endpoints, as listed by {@link Graph.listEdges}. */
export interface WeightedEdge {
  readonly source: number;
  readonly target: number;
  readonly weight: number;
}

/**
 * Directed graph over dense integer node ids `[0, n)`. Edges are appended in
 * insertion order, which fixes the exploration order of every traversal.
 * Once {@link freeze} has been called the shape can no longer change.
 */
export class Graph {
  private readonly adjacency: GraphEdge[][];
  private edges = 0;
  private frozen = false;

  constructor(
    private readonly n: number,
    private readonly directed = true
  ) {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new RangeError(`Node count must be a non-negative integer but received ${n}`);
    }
    this.adjacency = Array.from({ length: n }, () => []);
  }

  addEdge(u: number, v: number, weight: number): void {
    if (this.frozen) {
      throw new GraphFrozenError();
    }
    this.validateNode(u);
    this.validateNode(v);
    if (!Number.isSafeInteger(weight)) {
      throw new InvalidWeightError(weight);
    }
    this.adjacency[u].push({ target: v, weight });
    this.edges++;
  }

  /** Outgoing edges of `node`, in insertion order. */
  neighbors(node: number): readonly GraphEdge[] {
    this.validateNode(node);
    return this.adjacency[node];
  }

  nodeCount(): number {
    return this.n;
  }

  edgeCount(): number {
    return this.edges;
  }

  isDirected(): boolean {
    return this.directed;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  hasNode(node: number): boolean {
    return Number.isInteger(node) && node >= 0 && node < this.n;
  }

  listEdges(): WeightedEdge[] {
    const result: WeightedEdge[] = [];
    this.adjacency.forEach((edges, source) => {
      for (const edge of edges) {
        result.push({ source, target: edge.target, weight: edge.weight });
      }
    });
    return result;
  }

  /** Frozen copy with every edge reversed and weights preserved. */
  transpose(): Graph {
    const transposed = new Graph(this.n, true);
    this.adjacency.forEach((edges, source) => {
      for (const edge of edges) {
        transposed.addEdge(edge.target, source, edge.weight);
      }
    });
    return transposed.freeze();
  }

  toString(): string {
    const lines = [`Graph(n=${this.n}, directed=${this.directed})`];
    this.adjacency.forEach((edges, node) => {
      lines.push(`${node}: [${edges.map((edge) => `->${edge.target}(${edge.weight})`).join(", ")}]`);
    });
    return lines.join("\n");
  }

  private validateNode(node: number): void {
    if (!this.hasNode(node)) {
      throw new NodeOutOfRangeError(node, this.n);
    }
  }
}
