import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { convertAcross, timezoneLabel, WALL_TIME } from "@meetgrid/shared";
import type { RouteDeps, View } from "../deps.js";
import { renderConversion } from "../views/converter.js";
import { sendHtml, sendValidationError } from "./respond.js";

const ConvertQuery = z.object({
  time: z.string().regex(WALL_TIME, "expected HH:mm"),
  from: z.string().min(1),
});

export type ConvertRoutesOptions = RouteDeps & { view: View };

export const convertRoutes: FastifyPluginAsync<ConvertRoutesOptions> = async (
  app,
  { stores, clock, view },
) => {
  // GET /convert?time=09:00&from=America/New_York
  app.get("/convert", async (req, reply) => {
    const parsed = ConvertQuery.safeParse(req.query);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const { time, from } = parsed.data;
    const result = convertAcross(
      time,
      from,
      stores.readSession(req.sessionId).list(),
      clock(),
    );

    if (view === "html") return sendHtml(reply, renderConversion(result, timezoneLabel(from)));
    return result;
  });
};
