import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { currentTime, listTimezones, timezoneLabel } from "@meetgrid/shared";
import type { RouteDeps } from "../deps.js";
import { sendValidationError } from "./respond.js";

const TimeQuery = z.object({ timezone: z.string().min(1) });

export const catalogRoutes: FastifyPluginAsync<Pick<RouteDeps, "clock">> = async (
  app,
  { clock },
) => {
  app.get("/timezones", async () => ({ items: listTimezones() }));

  // GET /time?timezone=Europe/London
  app.get("/time", async (req, reply) => {
    const parsed = TimeQuery.safeParse(req.query);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const { timezone } = parsed.data;
    return {
      timezoneId: timezone,
      label: timezoneLabel(timezone),
      local: currentTime(timezone, clock()),
    };
  });
};
