import type { FastifyPluginAsync } from "fastify";
import { listTimezones } from "@meetgrid/shared";
import { renderIndexPage } from "../views/layout.js";
import { renderConverterForm } from "../views/converter.js";
import { renderDetailHint } from "../views/grid.js";
import { sendHtml } from "./respond.js";

export const pageRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_req, reply) => sendHtml(reply, renderIndexPage(listTimezones())));

  app.get("/fragments/converter", async (_req, reply) =>
    sendHtml(reply, renderConverterForm(listTimezones())),
  );

  app.get("/fragments/grid-detail-close", async (_req, reply) =>
    sendHtml(reply, renderDetailHint()),
  );
};
