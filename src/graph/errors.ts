import { ERROR_CODES, type ErrorCode } from "../types.js";

/**
 * Base class for every deterministic failure raised by the graph engine. The
 * errors are never retried: they describe malformed input or a caller using
 * the engine out of order.
 */
export class GraphEngineError extends Error {
  /** Stable error code surfaced to reports and logs. */
  public readonly code: ErrorCode;

  /** Optional operator hint describing how to recover from the error. */
  public readonly hint?: string;

  constructor(code: ErrorCode, message: string, hint?: string) {
    super(message);
    this.name = "GraphEngineError";
    this.code = code;
    this.hint = hint;
  }
}

/** Raised when a node id falls outside `[0, n)`. */
export class NodeOutOfRangeError extends GraphEngineError {
  public readonly details: { node: number; nodeCount: number };

  constructor(node: number, nodeCount: number, role = "Node") {
    super(
      ERROR_CODES.GRAPH_NODE_RANGE,
      nodeCount === 0
        ? `${role} ${node} is out of range: the graph has no nodes`
        : `${role} ${node} is out of range [0, ${nodeCount - 1}]`,
      "reference node ids between 0 and n - 1",
    );
    this.name = "NodeOutOfRangeError";
    this.details = { node, nodeCount };
  }
}

/** Raised when an edge weight is not a safe integer. */
export class InvalidWeightError extends GraphEngineError {
  constructor(weight: number) {
    super(ERROR_CODES.GRAPH_INVALID_WEIGHT, `edge weight ${weight} is not a safe integer`);
    this.name = "InvalidWeightError";
  }
}

/** Raised when a frozen graph receives a new edge. */
export class GraphFrozenError extends GraphEngineError {
  constructor() {
    super(ERROR_CODES.GRAPH_FROZEN, "graph is frozen and cannot accept new edges", "build a new graph instead");
    this.name = "GraphFrozenError";
  }
}

/** Raised before any distance computation when the supplied order cannot be used. */
export class InvalidTopologicalOrderError extends GraphEngineError {
  constructor(message: string) {
    super(ERROR_CODES.GRAPH_INVALID_ORDER, message, "check the order is non-empty before computing paths");
    this.name = "InvalidTopologicalOrderError";
  }
}

/** Raised when a path is reconstructed before any distances were computed. */
export class PathStateError extends GraphEngineError {
  constructor() {
    super(ERROR_CODES.GRAPH_PATH_STATE, "must compute paths before reconstructing");
    this.name = "PathStateError";
  }
}

/** Raised when a relaxed distance leaves the safe integer range. */
export class DistanceOverflowError extends GraphEngineError {
  public readonly details: { from: number; to: number };

  constructor(from: number, to: number) {
    super(
      ERROR_CODES.GRAPH_DISTANCE_OVERFLOW,
      `distance from ${from} to ${to} exceeds the safe integer range`,
      "reduce edge weight magnitudes",
    );
    this.name = "DistanceOverflowError";
    this.details = { from, to };
  }
}

/** Single problem found while validating a graph descriptor. */
export interface DescriptorViolation {
  /** JSON pointer to the offending location inside the descriptor. */
  readonly path: string;
  readonly message: string;
}

/** Raised when a graph descriptor fails validation. */
export class GraphDescriptorError extends GraphEngineError {
  public readonly details: { violations: DescriptorViolation[] };

  constructor(readonly violations: DescriptorViolation[]) {
    super(
      ERROR_CODES.GRAPH_INVALID_INPUT,
      violations.map((violation) => `${violation.path}: ${violation.message}`).join("; "),
      "graph_descriptor_invalid",
    );
    this.name = "GraphDescriptorError";
    this.details = { violations };
  }
}

/** Raised when a descriptor asks for a graph kind the planner does not handle. */
export class UnsupportedGraphError extends GraphEngineError {
  constructor(message: string) {
    super(ERROR_CODES.GRAPH_UNSUPPORTED, message, "declare the graph as directed");
    this.name = "UnsupportedGraphError";
  }
}
