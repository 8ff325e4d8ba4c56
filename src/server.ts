// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import formbody from "@fastify/formbody";
import pipelineParseRoute from "./routes/pipelines.parse.js";
import observabilityPlugin from "./plugins/observability.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { getConfig, resolveAllowedOrigins } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { log } from "./utils/telemetry.js";

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(): Promise<FastifyInstance> {
  const config = getConfig();

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: config.server.routeTimeoutMs,
    requestTimeout: config.server.routeTimeoutMs,
    genReqId: (req) => getOrGenerateRequestId(req.headers),
  });

  // CORS: allow-list from FRONTEND_URL / ALLOWED_ORIGINS
  await app.register(cors, {
    origin: resolveAllowedOrigins(config),
    credentials: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  // Security headers; CSP off for a JSON API
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  await app.register(rateLimit, {
    global: true,
    max: config.rateLimits.globalRpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      app.log.warn({
        event: "rate_limit_hit",
        max: context.max,
        request_id: requestId,
      }, "Rate limit exceeded");

      // statusCode is read by @fastify/rate-limit
      return {
        statusCode: 429,
        ...buildErrorV1(
          "RATE_LIMITED",
          "Too many requests",
          { retry_after_seconds: Math.max(1, Math.ceil(context.ttl / 1000)) },
          requestId,
        ),
      };
    },
  });

  // Front ends post nodes/edges as form fields
  await app.register(formbody);

  await app.register(observabilityPlugin, {
    infoSampleRate: config.observability.infoSampleRate,
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: envelope-level failures only
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      request.log.error({
        error,
        request_id: errorV1.request_id,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      request.log.warn({
        request_id: errorV1.request_id,
        code: errorV1.code,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    }

    if (errorV1.code === "RATE_LIMITED") {
      reply.header("Retry-After", String(errorV1.details?.retry_after_seconds ?? 60));
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(buildErrorV1("NOT_FOUND", `Route ${request.method}:${request.url} not found`, undefined, getRequestId(request)));
  });

  app.get("/", async () => ({ Ping: "Pong" }));

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
  }));

  await pipelineParseRoute(app);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      const config = getConfig();

      app.log.info({
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        node_env: config.server.nodeEnv,
        cors_origins: resolveAllowedOrigins(config),
        global_rate_limit_rpm: config.rateLimits.globalRpm,
        body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
        route_timeout_ms: config.server.routeTimeoutMs,
      }, "Pipeline DAG check service starting");

      await app.listen({ port: config.server.port, host: config.server.host });
    })
    .catch((err: unknown) => {
      log.fatal({ err }, "Failed to start server");
      process.exit(1);
    });
}
