import type { FastifyPluginAsync } from "fastify";
import type { HealthResponse } from "@arpwatch-exporter/shared";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const pipeline = app.coordinator.state;
    const daemonRunning = app.daemonMonitor?.lastCheck?.running ?? null;
    const ok = pipeline === "running";

    const payload: HealthResponse = {
      status: ok ? "ok" : "degraded",
      pipeline,
      daemonRunning,
      timestamp: new Date().toISOString(),
    };

    return reply.status(ok ? 200 : 503).send(payload);
  });
};
