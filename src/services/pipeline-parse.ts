import type { ParsePipelineRequestT } from "../schemas/pipeline.js";
import { validatePipeline, type PipelineValidationOutcome } from "../validators/index.js";

export type PipelineValidateFn = (nodesRaw: unknown, edgesRaw: unknown) => PipelineValidationOutcome;

type Decoded = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Decode one request field. Strings carry JSON (form posts); any other
 * value has already been decoded by the body parser.
 */
function decodeField(name: "nodes" | "edges", value: unknown): Decoded {
  if (value === undefined) {
    return { ok: false, error: `Missing required field: ${name}` };
  }
  if (typeof value !== "string") {
    return { ok: true, value };
  }
  try {
    const decoded: unknown = JSON.parse(value);
    return { ok: true, value: decoded };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Decode both fields and validate the pipeline.
 *
 * Always resolves to a response body: a validation result, or `{ error }`
 * for decode, shape and unexpected failures.
 */
export function parsePipeline(
  input: ParsePipelineRequestT,
  validate: PipelineValidateFn = validatePipeline,
): PipelineValidationOutcome {
  const nodes = decodeField("nodes", input.nodes);
  if (!nodes.ok) return { error: nodes.error };

  const edges = decodeField("edges", input.edges);
  if (!edges.ok) return { error: edges.error };

  try {
    return validate(nodes.value, edges.value);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { error: `Error processing pipeline: ${message}` };
  }
}
