/**
 * /pipelines/parse - DAG check for a front-end pipeline
 *
 * Request (POST body as JSON or form-urlencoded, or GET query string):
 * {
 *   nodes: string | unknown[];  // JSON-encoded list of { id, ... }
 *   edges: string | unknown[];  // JSON-encoded list of { source, target, ... }
 * }
 *
 * Response (always 200):
 * { num_nodes, num_edges, is_dag, message, status, issues } | { error }
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ParsePipelineRequest } from "../schemas/pipeline.js";
import { parsePipeline } from "../services/pipeline-parse.js";
import { isValidationError, type PipelineValidationOutcome } from "../validators/index.js";
import { getRequestId } from "../utils/request-id.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";

export const INVALID_ENVELOPE_MESSAGE = "Request must provide nodes and edges fields";

function handle(request: FastifyRequest, payload: unknown): PipelineValidationOutcome {
  const start = Date.now();
  const requestId = getRequestId(request);

  emit(TelemetryEvents.PipelineParseRequested, { request_id: requestId, method: request.method }, request.log);

  const parsed = ParsePipelineRequest.safeParse(payload);
  if (!parsed.success) {
    emit(
      TelemetryEvents.PipelineParseRejected,
      { request_id: requestId, reason: "invalid_envelope", latency_ms: Date.now() - start },
      request.log,
    );
    return { error: INVALID_ENVELOPE_MESSAGE };
  }

  const outcome = parsePipeline(parsed.data);

  if (isValidationError(outcome)) {
    emit(
      TelemetryEvents.PipelineParseRejected,
      { request_id: requestId, reason: outcome.error, latency_ms: Date.now() - start },
      request.log,
    );
  } else {
    emit(
      TelemetryEvents.PipelineParseCompleted,
      {
        request_id: requestId,
        num_nodes: outcome.num_nodes,
        num_edges: outcome.num_edges,
        is_dag: outcome.is_dag,
        status: outcome.status,
        issue_count: outcome.issues.length,
        latency_ms: Date.now() - start,
      },
      request.log,
    );
  }

  return outcome;
}

export default async function route(app: FastifyInstance): Promise<void> {
  app.post("/pipelines/parse", async (request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send(handle(request, request.body));
  });

  app.get("/pipelines/parse", async (request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send(handle(request, request.query));
  });
}
