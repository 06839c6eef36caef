import { randomUUID } from "node:crypto";
import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import { isUnknownTimezoneError } from "@meetgrid/shared";
import { requestIdPlugin } from "./middleware/requestId.js";
import { sessionPlugin } from "./middleware/session.js";
import { metricsPlugin } from "./metrics.js";
import { SessionStores, type SessionMode } from "./sessions.js";
import type { RouteDeps } from "./deps.js";
import { healthRoutes } from "./routes/health.js";
import { catalogRoutes } from "./routes/catalog.js";
import { participantRoutes } from "./routes/participants.js";
import { gridRoutes } from "./routes/grid.js";
import { convertRoutes } from "./routes/convert.js";
import { pageRoutes } from "./routes/pages.js";

export type AppOptions = {
  logger: FastifyBaseLogger;
  sessionMode: SessionMode;
  sessionHeader: string;
  maxSessions?: number;
  sessionIdleTtlMs?: number;
  clock?: () => Date;
  stores?: SessionStores;
};

export async function buildApp(opts: AppOptions) {
  const app = Fastify({
    loggerInstance: opts.logger,
    requestIdHeader: "x-request-id",
    genReqId: () => randomUUID(),
  });

  const deps: RouteDeps = {
    stores:
      opts.stores ??
      new SessionStores(opts.sessionMode, {
        maxSessions: opts.maxSessions,
        idleTtlMs: opts.sessionIdleTtlMs,
      }),
    clock: opts.clock ?? (() => new Date()),
  };

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (isUnknownTimezoneError(err)) {
      req.log.warn({ timezoneId: err.timezoneId }, "unknown timezone");
      return reply
        .code(400)
        .send({ error: err.code, timezoneId: err.timezoneId });
    }
    const status = err.statusCode ?? 500;
    if (status >= 500) {
      req.log.error({ err }, "request failed");
      return reply.code(status).send({ error: "internal" });
    }
    return reply.code(status).send({ error: err.code, message: err.message });
  });

  // Register plugins/routes
  await app.register(requestIdPlugin);
  await app.register(sessionPlugin, {
    stores: deps.stores,
    header: opts.sessionHeader,
  });
  await app.register(healthRoutes, deps);
  await app.register(metricsPlugin);
  await app.register(pageRoutes);
  await app.register(catalogRoutes, { ...deps, prefix: "/api" });
  await app.register(participantRoutes, { ...deps, view: "json", prefix: "/api" });
  await app.register(participantRoutes, { ...deps, view: "html", prefix: "/fragments" });
  await app.register(gridRoutes, { ...deps, view: "json", prefix: "/api" });
  await app.register(gridRoutes, { ...deps, view: "html", prefix: "/fragments" });
  await app.register(convertRoutes, { ...deps, view: "json", prefix: "/api" });
  await app.register(convertRoutes, { ...deps, view: "html", prefix: "/fragments" });

  return app;
}
