import { formatMetrics } from "../metrics.js";
import type { Distance } from "../graph/dagPaths.js";
import { formatGraphStats } from "../graph/stats.js";
import type { ExecutionPlan } from "./pipeline.js";

function formatList(values: readonly number[]): string {
  return `[${values.join(", ")}]`;
}

function formatDistance(distance: Distance, unit = "units"): string {
  return distance === null ? "unreachable" : `${distance} ${unit}`;
}

/** Human readable report of a plan, one section per pipeline stage. */
export function formatPlanReport(plan: ExecutionPlan): string {
  const lines: string[] = [];
  lines.push(`PLAN: ${plan.name}`);
  lines.push(formatGraphStats(plan.stats));
  lines.push(`Source task: ${plan.source}`);

  lines.push("", "1. STRONGLY CONNECTED COMPONENTS");
  lines.push(`Found ${plan.components.length} components (${plan.cyclicComponentCount} cyclic):`);
  plan.components.forEach((component, index) => {
    const kind = component.length === 1 ? "single" : "cycle";
    lines.push(`  Component ${index} (${kind}): ${formatList(component)}`);
  });
  lines.push(`  Metrics: ${formatMetrics(plan.metrics.scc)}`);

  lines.push("", "2. TOPOLOGICAL ORDER");
  lines.push(`  Component order: ${formatList(plan.componentOrder)}`);
  lines.push(`  Task order: ${formatList(plan.taskOrder)}`);
  lines.push(`  Metrics: ${formatMetrics(plan.metrics.topologicalSort)}`);

  lines.push("", "3. PATHS");
  if (plan.sourceComponent === null) {
    lines.push("  Empty graph: nothing to schedule");
  } else {
    lines.push(`  From component ${plan.sourceComponent}:`);
    plan.shortestDistances.forEach((distance, componentId) => {
      const longest = plan.longestDistances[componentId] ?? null;
      lines.push(
        `  -> Component ${componentId}: shortest ${formatDistance(distance)}, longest ${formatDistance(longest)}`,
      );
    });
    lines.push(`  Critical path length: ${plan.criticalPath.length}`);
    lines.push(`  Critical path components: ${formatList(plan.criticalPath.path)}`);
    lines.push(`  Critical task sequence: ${formatList(plan.criticalPath.taskPath)}`);
    lines.push(`  Metrics: ${formatMetrics(plan.metrics.longestPaths)}`);
  }
  return lines.join("\n");
}
