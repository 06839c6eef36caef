import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import {
  clockLabel,
  computeGrid,
  computeSlotDetail,
  slotForHour,
} from "@meetgrid/shared";
import type { RouteDeps, View } from "../deps.js";
import { gridComputations } from "../metrics.js";
import { renderGrid, renderSlotDetail } from "../views/grid.js";
import { sendHtml, sendValidationError } from "./respond.js";

const GridQuery = z.object({
  at: z.string().datetime({ offset: true }).optional(), // defaults to now
});

const HourParams = z.object({
  hour: z.coerce.number().int().min(0).max(23),
});

export type GridRoutesOptions = RouteDeps & { view: View };

export const gridRoutes: FastifyPluginAsync<GridRoutesOptions> = async (
  app,
  { stores, clock, view },
) => {
  app.get("/grid", async (req, reply) => {
    const parsed = GridQuery.safeParse(req.query);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const store = stores.readSession(req.sessionId);
    const reference = parsed.data.at ? new Date(parsed.data.at) : clock();
    const slots = computeGrid(reference, store.windows());
    gridComputations.labels("grid").inc();

    if (view === "html") return sendHtml(reply, renderGrid(slots, store.size));
    return {
      reference: reference.toISOString(),
      participants: store.size,
      slots,
    };
  });

  // Drill-down for one UTC hour of today
  app.get("/grid/:hour", async (req, reply) => {
    const parsed = HourParams.safeParse(req.params);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const { hour } = parsed.data;
    const instant = slotForHour(hour, clock());
    const rows = computeSlotDetail(instant, stores.readSession(req.sessionId).list());
    gridComputations.labels("detail").inc();

    if (view === "html") return sendHtml(reply, renderSlotDetail(hour, rows));
    return {
      instant: instant.toISOString(),
      label: `${clockLabel(hour)} UTC`,
      rows,
    };
  });
};
