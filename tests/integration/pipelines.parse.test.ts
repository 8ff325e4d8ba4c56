import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { build } from "../../src/server.js";
import { SERVICE_VERSION } from "../../src/version.js";
import { INVALID_ENVELOPE_MESSAGE } from "../../src/routes/pipelines.parse.js";
import { setTestSink, type TelemetryData } from "../../src/utils/telemetry.js";
import { cleanCorsEnv } from "../helpers/env-setup.js";
import { chain, edge, nodes } from "../helpers/pipeline-fixtures.js";

function encoded(nodeList: unknown[], edgeList: unknown[]): { nodes: string; edges: string } {
  return { nodes: JSON.stringify(nodeList), edges: JSON.stringify(edgeList) };
}

describe("/pipelines/parse", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    cleanCorsEnv();
    vi.stubEnv("FRONTEND_URL", "http://localhost:3000");
    app = await build();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  afterEach(() => {
    setTestSink(null);
  });

  describe("health", () => {
    it("answers the root ping", async () => {
      const res = await app.inject({ method: "GET", url: "/" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ Ping: "Pong" });
    });

    it("reports service and version", async () => {
      const res = await app.inject({ method: "GET", url: "/healthz" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ ok: true, service: "pipeline-dag-check", version: SERVICE_VERSION });
    });
  });

  describe("POST", () => {
    it("validates JSON-encoded fields", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        payload: encoded(nodes("A", "B", "C"), chain("A", "B", "C")),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        num_nodes: 3,
        num_edges: 2,
        is_dag: true,
        message: "Valid pipeline structure",
        status: "valid",
        issues: [],
      });
    });

    it("accepts form-urlencoded fields", async () => {
      const form = new URLSearchParams(encoded(nodes("A", "B"), [edge("A", "B"), edge("B", "A")]));

      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        payload: form.toString(),
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.is_dag).toBe(false);
      expect(body.status).toBe("cyclic");
      expect(body.message).toBe("Pipeline contains cycles and is not a valid DAG");
    });

    it("accepts already-decoded arrays", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        payload: { nodes: nodes("A", "B"), edges: [] },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ num_nodes: 2, num_edges: 0, is_dag: true, status: "isolated" });
    });

    it("returns the empty verdict for empty lists", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        payload: { nodes: "[]", edges: "[]" },
      });

      expect(res.json()).toMatchObject({ is_dag: true, message: "Empty pipeline - no nodes or edges" });
    });

    it("reports a decoded value that is not a list with a 200", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        payload: { nodes: '{"id": "A"}', edges: "[]" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ error: "Nodes data must be a list" });
    });

    it("reports undecodable field text with a 200", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        payload: { nodes: "[", edges: "[]" },
      });

      expect(res.statusCode).toBe(200);
      expect(Object.keys(res.json())).toEqual(["error"]);
    });

    it("reports a missing field", async () => {
      const res = await app.inject({ method: "POST", url: "/pipelines/parse", payload: {} });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ error: "Missing required field: nodes" });
    });

    it("rejects a body that is not an object", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        headers: { "content-type": "application/json" },
        payload: "[1, 2]",
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ error: INVALID_ENVELOPE_MESSAGE });
    });

    it("answers malformed JSON with an error.v1 envelope", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        headers: { "content-type": "application/json" },
        payload: "{not json",
      });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.schema).toBe("error.v1");
      expect(body.code).toBe("BAD_INPUT");
      expect(body.request_id).toBe(res.headers["x-request-id"]);
    });

    it("answers an unsupported content type with 415", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        headers: { "content-type": "text/csv" },
        payload: "nodes,edges",
      });

      expect(res.statusCode).toBe(415);
      expect(res.json().code).toBe("UNSUPPORTED_MEDIA_TYPE");
    });
  });

  describe("GET", () => {
    it("reads fields from the query string", async () => {
      const query = new URLSearchParams(encoded(nodes("A"), [edge("A", "Z")]));

      const res = await app.inject({ method: "GET", url: `/pipelines/parse?${query.toString()}` });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe("dangling_reference");
      expect(body.is_dag).toBe(false);
      expect(body.issues).toEqual([
        {
          code: "DANGLING_REFERENCE",
          severity: "error",
          message: 'Edge target "Z" does not match any node id',
          path: "edges[0].target",
          context: { field: "target", id: "Z" },
        },
      ]);
    });
  });

  describe("envelope", () => {
    it("returns error.v1 for an unknown route", async () => {
      const res = await app.inject({ method: "GET", url: "/pipelines/unknown" });

      expect(res.statusCode).toBe(404);
      const body = res.json();
      expect(body.schema).toBe("error.v1");
      expect(body.code).toBe("NOT_FOUND");
      expect(body.message).toBe("Route GET:/pipelines/unknown not found");
    });

    it("echoes the caller's X-Request-Id", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/",
        headers: { "x-request-id": "req-abc" },
      });

      expect(res.headers["x-request-id"]).toBe("req-abc");
    });

    it("generates an X-Request-Id when none is sent", async () => {
      const res = await app.inject({ method: "GET", url: "/" });

      expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("allows the configured front-end origin", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/",
        headers: { origin: "http://localhost:3000" },
      });

      expect(res.headers["access-control-allow-origin"]).toBe("http://localhost:3000");
    });

    it("does not allow other origins", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/",
        headers: { origin: "http://evil.example" },
      });

      expect(res.headers["access-control-allow-origin"]).toBeUndefined();
    });
  });

  describe("telemetry", () => {
    it("emits requested and completed events", async () => {
      const events: Array<{ name: string; data: TelemetryData }> = [];
      setTestSink((name, data) => {
        events.push({ name, data });
      });

      const res = await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        headers: { "x-request-id": "req-telemetry" },
        payload: encoded(nodes("A", "B"), chain("A", "B")),
      });

      expect(res.statusCode).toBe(200);
      expect(events.map((e) => e.name)).toEqual(["pipeline.parse.requested", "pipeline.parse.completed"]);
      expect(events[1].data).toMatchObject({
        request_id: "req-telemetry",
        num_nodes: 2,
        num_edges: 1,
        is_dag: true,
        status: "valid",
        issue_count: 0,
      });
    });

    it("emits a rejected event for an invalid envelope", async () => {
      const events: string[] = [];
      setTestSink((name) => {
        events.push(name);
      });

      await app.inject({
        method: "POST",
        url: "/pipelines/parse",
        headers: { "content-type": "application/json" },
        payload: '"nodes"',
      });

      expect(events).toEqual(["pipeline.parse.requested", "pipeline.parse.rejected"]);
    });
  });
});
