import client from "prom-client";
import type { FastifyPluginAsync } from "fastify";

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry, prefix: "meetgrid_api_" });

export const gridComputations = new client.Counter({
  name: "meetgrid_api_grid_computations_total",
  help: "Viability grids and slot details computed",
  labelNames: ["kind"] as const,
  registers: [registry],
});

export const participantChanges = new client.Counter({
  name: "meetgrid_api_participants_changes_total",
  help: "Participant mutations that changed a store, by action",
  labelNames: ["action"] as const,
  registers: [registry],
});

export const metricsPlugin: FastifyPluginAsync = async (app) => {
  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", registry.contentType);
    return registry.metrics();
  });
};
