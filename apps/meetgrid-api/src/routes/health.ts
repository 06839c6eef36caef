import type { FastifyPluginAsync } from "fastify";
import { listTimezones } from "@meetgrid/shared";
import type { RouteDeps } from "../deps.js";

export const healthRoutes: FastifyPluginAsync<Pick<RouteDeps, "stores">> = async (
  app,
  { stores },
) => {
  app.get("/health/live", async () => ({ ok: true }));

  app.get("/health/ready", async () => {
    if (listTimezones().length === 0) throw new Error("timezone catalog empty");
    return { ok: true, sessions: stores.size };
  });
};
