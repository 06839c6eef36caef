import pino from "pino";
import { env } from "./config.js";
import { buildApp } from "./app.js";

const logger = pino({
  level: env.LOG_LEVEL,
  transport:
    env.NODE_ENV === "development"
      ? { target: "pino-pretty", options: { singleLine: true } }
      : undefined,
});

async function main() {
  const app = await buildApp({
    logger,
    sessionMode: env.SESSION_MODE,
    sessionHeader: env.SESSION_HEADER,
    maxSessions: env.SESSION_MAX,
    sessionIdleTtlMs: env.SESSION_IDLE_TTL_MS,
  });

  const shutdown = (signal: string) => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(err, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info(
    { port: env.PORT, sessionMode: env.SESSION_MODE },
    "meetgrid-api listening",
  );
}

main().catch((err: unknown) => {
  logger.fatal(err, "fatal boot error");
  process.exit(1);
});
