import { z } from "zod";

/**
 * Node identifier: any JSON scalar, compared by value. The string "1" and
 * the number 1 are different ids, as are `null` and "null".
 */
export const NodeId = z.union([z.string(), z.number(), z.boolean(), z.null()], {
  errorMap: () => ({ message: "must be a string, number, boolean or null" }),
});

/**
 * Pipeline node. Only `id` is structural; everything else the front end
 * sends along (type, data, position) passes through untouched.
 */
export const PipelineNode = z
  .object({ id: NodeId }, { errorMap: () => ({ message: "must be an object" }) })
  .passthrough();

/**
 * Pipeline edge: a dependency from `source` to `target`.
 */
export const PipelineEdge = z
  .object(
    { source: NodeId, target: NodeId },
    { errorMap: () => ({ message: "must be an object" }) },
  )
  .passthrough();

/**
 * Request envelope for /pipelines/parse. Each field is either a
 * JSON-encoded string (form posts) or an already-decoded value.
 */
export const ParsePipelineRequest = z.object({
  nodes: z.unknown(),
  edges: z.unknown(),
});

export type NodeIdT = z.infer<typeof NodeId>;
export type ParsePipelineRequestT = z.infer<typeof ParsePipelineRequest>;
