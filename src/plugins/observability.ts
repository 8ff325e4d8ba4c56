import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";
import { env } from "node:process";
import { getRequestId } from "../utils/request-id.js";

/**
 * Observability Plugin
 *
 * Structured request logging:
 * - Request completion logs, sampled for 2xx/3xx
 * - Errors and 4xx/5xx always logged
 * - Request ID and duration on every line
 */

export interface ObservabilityOptions {
  /** Fraction of successful requests logged at info, 0..1 */
  infoSampleRate: number;
}

/**
 * Should we sample this request for info-level logging?
 * Always log errors (4xx, 5xx), sample successful requests.
 */
export function shouldSampleInfoLog(statusCode: number, sampleRate: number): boolean {
  if (statusCode >= 400) return true;
  return Math.random() < sampleRate;
}

async function observabilityPlugin(fastify: FastifyInstance, opts: ObservabilityOptions) {
  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = reply.statusCode;

    if (!shouldSampleInfoLog(statusCode, opts.infoSampleRate)) {
      return;
    }

    const logData = {
      request_id: getRequestId(request),
      method: request.method,
      url: request.url,
      status: statusCode,
      duration_ms: Math.round(reply.elapsedTime),
      user_agent: request.headers["user-agent"],
    };

    if (statusCode >= 500) {
      fastify.log.error(logData, "Request completed with server error");
    } else if (statusCode >= 400) {
      fastify.log.warn(logData, "Request completed with client error");
    } else {
      fastify.log.info(logData, "Request completed");
    }
  });

  fastify.addHook("onError", async (request: FastifyRequest, reply: FastifyReply, error: Error) => {
    fastify.log.error(
      {
        request_id: getRequestId(request),
        method: request.method,
        url: request.url,
        duration_ms: Math.round(reply.elapsedTime),
        error: {
          name: error.name,
          message: error.message,
          // Never log stack in production unless explicitly enabled
          ...(env.LOG_STACK === "1" ? { stack: error.stack } : {}),
        },
      },
      "Request error"
    );
  });
}

export default fp(observabilityPlugin, {
  name: "observability",
  fastify: "5.x",
});
