import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

// Fastify reads x-request-id (or mints a UUID) into req.id; echo it back
export const requestIdPlugin: FastifyPluginAsync = fp(async (app) => {
  app.addHook("onRequest", (req, reply, done) => {
    reply.header("x-request-id", req.id);
    done();
  });
});
