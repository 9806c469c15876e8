import { readFile } from "node:fs/promises";
import { z } from "zod";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { GraphDescriptorError, type DescriptorViolation } from "./errors.js";
import { Graph } from "./model.js";

const NodeIdSchema = z.number().int().nonnegative();

/** Schema of a single `{ u, v, w }` edge entry. */
const EdgeDescriptorSchema = z
  .object({
    u: NodeIdSchema,
    v: NodeIdSchema,
    w: z.number().int().refine(Number.isSafeInteger, { message: "weight must be a safe integer" }),
  })
  .strict();

/**
 * Schema of the graph descriptor files. Cross-field checks (endpoints and the
 * source below `n`) run once the individual fields are known to be well formed.
 * An empty graph has no source; only the default `0` is accepted for it.
 */
export const GraphDescriptorSchema = z
  .object({
    directed: z.boolean().default(true),
    n: NodeIdSchema,
    edges: z.array(EdgeDescriptorSchema).default([]),
    source: NodeIdSchema.default(0),
    weight_model: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((descriptor, ctx) => {
    descriptor.edges.forEach((edge, index) => {
      for (const key of ["u", "v"] as const) {
        if (edge[key] >= descriptor.n) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["edges", index, key],
            message: `node ${edge[key]} is out of range [0, ${descriptor.n - 1}]`,
          });
        }
      }
    });
    if (descriptor.source >= descriptor.n && (descriptor.n > 0 || descriptor.source !== 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["source"],
        message:
          descriptor.n === 0
            ? `source ${descriptor.source} given for an empty graph`
            : `source ${descriptor.source} is out of range [0, ${descriptor.n - 1}]`,
      });
    }
  });

export type GraphDescriptor = z.infer<typeof GraphDescriptorSchema>;
export type GraphDescriptorInput = z.input<typeof GraphDescriptorSchema>;

/** Validates an untrusted payload, throwing {@link GraphDescriptorError} with every issue found. */
export function parseGraphDescriptor(input: unknown): GraphDescriptor {
  const result = GraphDescriptorSchema.safeParse(input);
  if (!result.success) {
    const violations: DescriptorViolation[] = result.error.issues.map((issue) => ({
      path: `/${issue.path.join("/")}`,
      message: issue.message,
    }));
    throw new GraphDescriptorError(violations);
  }
  return result.data;
}

/** Builds a frozen graph, adding edges in descriptor order. */
export function createGraphFromDescriptor(descriptor: GraphDescriptor): Graph {
  const graph = new Graph(descriptor.n, descriptor.directed);
  for (const edge of descriptor.edges) {
    graph.addEdge(edge.u, edge.v, edge.w);
  }
  return graph.freeze();
}

/** Reads and validates a JSON descriptor file. */
export async function loadGraphDescriptor(filePath: string): Promise<GraphDescriptor> {
  const contents = await readFile(filePath, "utf8");
  let payload: unknown;
  try {
    payload = JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GraphDescriptorError([{ path: "/", message: `invalid JSON: ${reason}` }]);
  }
  return parseGraphDescriptor(payload);
}
