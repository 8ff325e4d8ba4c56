import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Standalone pino logger for code that runs outside a request
 * (startup, shutdown). Shares redaction paths with the Fastify logger.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryData = Record<string, unknown>;

type TestSink = (eventName: string, data: TelemetryData) => void;

/**
 * Minimal logger surface emit() writes to (pino or a Fastify request logger).
 */
export interface EventLogger {
  info(obj: TelemetryData): void;
}

let testSink: TestSink | null = null;

/**
 * Capture emitted events in tests. Refuses outside a test environment.
 */
export function setTestSink(sink: TestSink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 */
export const TelemetryEvents = {
  PipelineParseRequested: "pipeline.parse.requested",
  PipelineParseCompleted: "pipeline.parse.completed",
  PipelineParseRejected: "pipeline.parse.rejected",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Emit a telemetry event through the given logger (defaults to the
 * standalone one) and the test sink when installed.
 */
export function emit(
  event: TelemetryEventName,
  data: TelemetryData,
  logger: EventLogger = log,
): void {
  if (testSink) {
    testSink(event, data);
  }
  logger.info({ event, ...data });
}
