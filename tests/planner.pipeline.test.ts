import { describe, it } from "mocha";
import { expect } from "chai";

import { NodeOutOfRangeError, UnsupportedGraphError } from "../src/graph/errors.js";
import { Graph } from "../src/graph/model.js";
import { StructuredLogger, type LogEntry } from "../src/logger.js";
import { planExecution, planFromDescriptor, PlanningError } from "../src/planner/pipeline.js";
import { ERROR_CODES, summariseError } from "../src/types.js";
import { triangleCycle, twoCyclesGraph } from "./helpers/graphs.js";
import { captureStdout } from "./helpers/stdout.js";

describe("planning pipeline", () => {
  it("plans a graph with cyclic task groups", () => {
    const plan = planExecution({ name: "two-cycles", graph: twoCyclesGraph(), source: 0 });

    expect(plan.components).to.deep.equal([[0, 1], [2, 3], [4]]);
    expect(plan.cyclicComponentCount).to.equal(2);
    expect(plan.condensationEdges).to.deep.equal([
      { source: 0, target: 1, weight: 9 },
      { source: 1, target: 2, weight: 4 },
    ]);
    expect(plan.componentOrder).to.deep.equal([0, 1, 2]);
    expect(plan.taskOrder).to.deep.equal([0, 1, 2, 3, 4]);
    expect(plan.sourceComponent).to.equal(0);
    expect(plan.shortestDistances).to.deep.equal([0, 9, 13]);
    expect(plan.longestDistances).to.deep.equal([0, 9, 13]);
    expect(plan.criticalPath).to.deep.equal({ length: 13, path: [0, 1, 2], taskPath: [0, 1, 2, 3, 4] });
  });

  it("measures paths from the component holding the source task", () => {
    const plan = planExecution({ name: "two-cycles", graph: twoCyclesGraph(), source: 2 });

    expect(plan.sourceComponent).to.equal(1);
    expect(plan.shortestDistances).to.deep.equal([null, 0, 4]);
    expect(plan.criticalPath).to.deep.equal({ length: 4, path: [1, 2], taskPath: [2, 3, 4] });
  });

  it("aggregates the metrics of every stage", () => {
    const { metrics } = planExecution({ name: "two-cycles", graph: twoCyclesGraph(), source: 0 });

    expect(metrics.scc.dfsVisits).to.equal(10);
    expect(metrics.scc.edgeTraversals).to.equal(14);
    expect(metrics.topologicalSort.queuePushes).to.equal(3);
    expect(metrics.topologicalSort.queuePops).to.equal(3);
    expect(metrics.shortestPaths.relaxOperations).to.equal(2);
    expect(metrics.longestPaths.relaxOperations).to.equal(2);
    expect(metrics.total.relaxOperations).to.equal(4);
    expect(metrics.total.dfsVisits).to.equal(10);
  });

  it("plans a graph that is one big cycle", () => {
    const plan = planExecution({ name: "triangle", graph: triangleCycle(), source: 1 });

    expect(plan.components).to.deep.equal([[0, 2, 1]]);
    expect(plan.componentOrder).to.deep.equal([0]);
    expect(plan.taskOrder).to.deep.equal([0, 2, 1]);
    expect(plan.shortestDistances).to.deep.equal([0]);
    expect(plan.criticalPath).to.deep.equal({ length: 0, path: [], taskPath: [] });
  });

  it("returns an empty plan for an empty graph", () => {
    const plan = planExecution({ name: "empty", graph: new Graph(0), source: 0 });

    expect(plan.components).to.deep.equal([]);
    expect(plan.componentOrder).to.deep.equal([]);
    expect(plan.sourceComponent).to.equal(null);
    expect(plan.shortestDistances).to.deep.equal([]);
    expect(plan.criticalPath).to.deep.equal({ length: 0, path: [], taskPath: [] });
    expect(plan.metrics.shortestPaths.relaxOperations).to.equal(0);
  });

  it("rejects undirected graphs", () => {
    expect(() => planExecution({ name: "undirected", graph: new Graph(2, false), source: 0 }))
      .to.throw(UnsupportedGraphError)
      .with.property("code", ERROR_CODES.GRAPH_UNSUPPORTED);
  });

  it("rejects a source task outside the graph", () => {
    expect(() => planExecution({ name: "two-cycles", graph: twoCyclesGraph(), source: 5 })).to.throw(
      NodeOutOfRangeError,
      "Source node 5 is out of range [0, 4]",
    );
  });

  it("rejects a source other than 0 on an empty graph", () => {
    expect(() => planExecution({ name: "empty", graph: new Graph(0), source: 7 })).to.throw(
      NodeOutOfRangeError,
      "Source node 7 is out of range: the graph has no nodes",
    );
    const descriptor = { directed: true, n: 0, edges: [], source: 0 };
    expect(() => planFromDescriptor("empty", descriptor, { sourceOverride: 3 })).to.throw(NodeOutOfRangeError);
  });

  it("logs every stage under the graph name", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ level: "debug", onEntry: (entry) => entries.push(entry) });
    const capture = captureStdout();
    try {
      planExecution({ name: "two-cycles", graph: twoCyclesGraph(), source: 0 }, { logger });
    } finally {
      capture.restore();
    }

    expect(entries.map((entry) => entry.message)).to.deep.equal([
      "scc_completed",
      "topological_sort_completed",
      "paths_completed",
      "plan_completed",
    ]);
    expect(entries[3].level).to.equal("info");
    expect(entries[3].payload).to.deep.equal({ graph: "two-cycles", components: 3, critical_path_length: 13 });
    expect(capture.entries().map((entry) => entry.message)).to.include("plan_completed");
  });

  it("lets callers override the descriptor source", () => {
    const descriptor = {
      directed: true,
      n: 3,
      edges: [
        { u: 0, v: 1, w: 2 },
        { u: 1, v: 2, w: 3 },
      ],
      source: 0,
    };

    expect(planFromDescriptor("chain.json", descriptor).criticalPath.length).to.equal(5);
    const overridden = planFromDescriptor("chain.json", descriptor, { sourceOverride: 1 });
    expect(overridden.source).to.equal(1);
    expect(overridden.shortestDistances).to.deep.equal([null, 0, 3]);
  });

  it("exposes a catalogued code on planning failures", () => {
    const summary = summariseError(new PlanningError("condensation is not acyclic"));

    expect(summary).to.deep.equal({
      code: ERROR_CODES.PLAN_CYCLIC_CONDENSATION,
      message: "condensation is not acyclic",
    });
  });
});
