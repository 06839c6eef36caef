import { config as loadEnv } from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
loadEnv({ path: path.resolve(__dirname, "../../../.env") });

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z.string().default("production"),
  // "shared" keeps every caller on one bucket (legacy single-session mode)
  SESSION_MODE: z.enum(["per-session", "shared"]).default("per-session"),
  SESSION_HEADER: z.string().min(1).default("x-session-id"),
  SESSION_MAX: z.coerce.number().int().positive().default(1000),
  SESSION_IDLE_TTL_MS: z.coerce.number().int().positive().default(3_600_000),
});

export type Env = z.infer<typeof EnvSchema>;

export const env = EnvSchema.parse(process.env);
