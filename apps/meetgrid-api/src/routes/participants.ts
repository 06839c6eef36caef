import type { FastifyPluginAsync, FastifyReply } from "fastify";
import { z } from "zod";
import {
  canonicalTimezone,
  currentTime,
  DEFAULT_PREFERRED_END,
  DEFAULT_PREFERRED_START,
} from "@meetgrid/shared";
import type { SelectionStore } from "@meetgrid/shared";
import type { RouteDeps, View } from "../deps.js";
import { participantChanges } from "../metrics.js";
import { renderParticipantList, type ParticipantView } from "../views/participants.js";
import { sendHtml, sendValidationError } from "./respond.js";

// Form inputs arrive as strings; an empty field means "use the default".
// Only numeric strings are converted, anything else must already be a number.
const hour = (fallback: number) =>
  z.preprocess(
    (v) => {
      if (v === "" || v === null) return undefined;
      if (typeof v === "string" && v.trim() !== "") return Number(v);
      return v;
    },
    z.number().int().min(0).max(23).default(fallback),
  );

export const AddParticipantBody = z.object({
  timezone: z.string().trim().optional(),
});

// Out-of-range hours are rejected here; the store itself does not check them
export const UpdateHoursBody = z.object({
  start: hour(DEFAULT_PREFERRED_START),
  end: hour(DEFAULT_PREFERRED_END),
});

const EntryParams = z.object({ entryId: z.string().min(1) });

export type ParticipantRoutesOptions = RouteDeps & { view: View };

export const participantRoutes: FastifyPluginAsync<ParticipantRoutesOptions> = async (
  app,
  { stores, clock, view },
) => {
  const send = (reply: FastifyReply, store: SelectionStore) => {
    const now = clock();
    const items: ParticipantView[] = store
      .list()
      .map((entry) => ({ ...entry, now: currentTime(entry.timezoneId, now) }));
    if (view === "html") return sendHtml(reply, renderParticipantList(items));
    return reply.send({ items });
  };

  app.get("/participants", async (req, reply) =>
    send(reply, stores.readSession(req.sessionId)),
  );

  app.post("/participants", async (req, reply) => {
    const parsed = AddParticipantBody.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const { timezone } = parsed.data;
    // Empty selection: nothing to add, just re-render
    if (!timezone) return send(reply, stores.readSession(req.sessionId));

    const timezoneId = canonicalTimezone(timezone);
    const store = stores.forSession(req.sessionId);
    if (store.add(timezoneId)) {
      participantChanges.labels("add").inc();
      req.log.info({ sessionId: req.sessionId, timezoneId }, "participant added");
    }
    return send(reply, store);
  });

  app.delete("/participants/:entryId", async (req, reply) => {
    const params = EntryParams.safeParse(req.params);
    if (!params.success) return sendValidationError(reply, params.error);

    // an unknown session has nothing to remove, so it is not created here
    const store = stores.readSession(req.sessionId);
    const { entryId } = params.data;
    if (store.remove(entryId)) {
      participantChanges.labels("remove").inc();
      req.log.info({ sessionId: req.sessionId, entryId }, "participant removed");
    }
    return send(reply, store);
  });

  app.patch("/participants/:entryId/hours", async (req, reply) => {
    const params = EntryParams.safeParse(req.params);
    if (!params.success) return sendValidationError(reply, params.error);
    const body = UpdateHoursBody.safeParse(req.body ?? {});
    if (!body.success) return sendValidationError(reply, body.error);

    const store = stores.readSession(req.sessionId);
    const { entryId } = params.data;
    const { start, end } = body.data;
    if (store.updateHours(entryId, start, end)) {
      participantChanges.labels("update_hours").inc();
      req.log.info(
        { sessionId: req.sessionId, entryId, start, end },
        "participant hours updated",
      );
    }
    return send(reply, store);
  });
};
