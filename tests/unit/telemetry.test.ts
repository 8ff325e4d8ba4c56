import { describe, it, expect, vi, afterEach } from "vitest";
import { emit, setTestSink, TelemetryEvents, type TelemetryData } from "../../src/utils/telemetry.js";

describe("telemetry", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    setTestSink(null);
  });

  it("writes the event name alongside its data", () => {
    const logger = { info: vi.fn((_obj: TelemetryData) => undefined) };

    emit(TelemetryEvents.PipelineParseCompleted, { request_id: "req-1", is_dag: true }, logger);

    expect(logger.info).toHaveBeenCalledWith({
      event: "pipeline.parse.completed",
      request_id: "req-1",
      is_dag: true,
    });
  });

  it("forwards events to the test sink", () => {
    const events: Array<{ name: string; data: TelemetryData }> = [];
    setTestSink((name, data) => events.push({ name, data }));

    emit(TelemetryEvents.PipelineParseRejected, { reason: "invalid_envelope" }, { info: () => undefined });

    expect(events).toEqual([{ name: "pipeline.parse.rejected", data: { reason: "invalid_envelope" } }]);
  });

  it("refuses a sink outside a test environment", () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("VITEST", "");

    expect(() => setTestSink(() => undefined)).toThrow("setTestSink() can only be used in test environment");
  });

  it("keeps event names frozen", () => {
    expect(TelemetryEvents).toEqual({
      PipelineParseRequested: "pipeline.parse.requested",
      PipelineParseCompleted: "pipeline.parse.completed",
      PipelineParseRejected: "pipeline.parse.rejected",
    });
  });
});
