import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";
import { MetricRegistry } from "../metrics/metric-registry.js";
import { parseExposition } from "../metrics/exposition-parser.js";
import { PipelineCoordinator } from "../pipeline/coordinator.js";
import { Classifier } from "../patterns/classifier.js";
import { PatternTable } from "../patterns/pattern-table.js";

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let app: FastifyInstance;
let registry: MetricRegistry;

beforeEach(async () => {
  const table = new PatternTable();
  registry = new MetricRegistry(table.rules);
  // Never run: the routes only read its state
  const coordinator = new PipelineCoordinator("/nonexistent/arpwatch.log", new Classifier(table), registry);
  app = await buildApp({ registry, coordinator });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await app.close();
});

// ---------------------------------------------------------------------------
// GET /metrics
// ---------------------------------------------------------------------------

describe("GET /metrics", () => {
  it("returns the registry snapshot in the exposition format", async () => {
    registry.recordEvent("new_station");
    registry.recordEvent("bogon");

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe(registry.contentType);
    const samples = parseExposition(res.body);
    expect(samples.get("arpwatch_new_station_total")).toBe(1);
    expect(samples.get("arpwatch_bogon_total")).toBe(1);
    expect(samples.get("arpwatch_events_total")).toBe(2);
    expect(samples.get("arpwatch_unrecognized_lines_total")).toBe(0);
  });

  it("lists every counter before anything happened", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });
    const samples = parseExposition(res.body);
    expect(samples.get("arpwatch_flip_flop_total")).toBe(0);
    expect(samples.get("arpwatch_suppressed_flip_flop_total")).toBe(0);
    expect(samples.get("arpwatch_process_health")).toBe(0);
  });

  it("returns identical bodies for back-to-back scrapes", async () => {
    registry.recordEvent("ip_broadcast");
    const first = await app.inject({ method: "GET", url: "/metrics" });
    const second = await app.inject({ method: "GET", url: "/metrics" });
    expect(second.body).toBe(first.body);
  });

  it("returns 500 when rendering fails", async () => {
    vi.spyOn(registry, "renderSnapshot").mockRejectedValue(new Error("render failed"));

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe("Failed to render metrics\n");
  });
});

// ---------------------------------------------------------------------------
// Other routes
// ---------------------------------------------------------------------------

describe("unknown routes", () => {
  it("returns 404 JSON", async () => {
    const res = await app.inject({ method: "GET", url: "/nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Not found" });
  });

  it("does not accept writes to /metrics", async () => {
    const res = await app.inject({ method: "POST", url: "/metrics" });
    expect(res.statusCode).toBe(404);
  });
});
