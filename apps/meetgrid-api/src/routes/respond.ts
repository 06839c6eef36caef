import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";
import type { SafeHtml } from "../views/html.js";

export function sendHtml(reply: FastifyReply, body: SafeHtml) {
  return reply.type("text/html; charset=utf-8").send(body.value);
}

export function sendValidationError(reply: FastifyReply, error: ZodError) {
  return reply.code(400).send({ error: "validation", details: error.flatten() });
}
