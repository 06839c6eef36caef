import type { FastifyInstance } from "fastify";
import fp from "fastify-plugin";
import { z } from "zod";
import type { SessionStores } from "../sessions.js";

declare module "fastify" {
  interface FastifyRequest {
    sessionId: string;
  }
}

const SessionKey = z.string().regex(/^[\w-]{1,128}$/);

export type SessionPluginOptions = {
  stores: SessionStores;
  header: string;
};

export const sessionPlugin = fp(
  async (app: FastifyInstance, opts: SessionPluginOptions) => {
    const header = opts.header.toLowerCase();
    app.decorateRequest("sessionId", "");

    app.addHook("onRequest", async (req, reply) => {
      const raw = req.headers[header];
      if (raw !== undefined) {
        const parsed = SessionKey.safeParse(raw);
        if (!parsed.success) {
          return reply.code(400).send({ error: "invalid_session", header });
        }
        req.sessionId = opts.stores.resolveKey(parsed.data);
        return;
      }
      req.sessionId = opts.stores.resolveKey();
    });
  },
);
