/**
 * GET /metrics — Prometheus scrape endpoint.
 *
 * Reads the registry only; a failed render is reported to the scraper
 * and never reaches the pipeline.
 */

import type { FastifyPluginAsync } from "fastify";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (request, reply) => {
    let body: string;
    try {
      body = await app.registry.renderSnapshot();
    } catch (err) {
      request.log.error({ err }, "Failed to render metrics snapshot");
      return reply
        .status(500)
        .type("text/plain; charset=utf-8")
        .send("Failed to render metrics\n");
    }

    return reply.type(app.registry.contentType).send(body);
  });
};
