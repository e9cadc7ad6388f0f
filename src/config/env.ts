// src/config/env.ts
import dotenv from "dotenv";
import { z } from "zod";

// Honor ENV_FILE if present; otherwise default to .env.dev in dev, .env in prod.
const ENV_FILE =
  process.env.ENV_FILE ||
  (process.env.NODE_ENV === "production" ? ".env" : ".env.dev");

let loaded = false;

function loadEnvFile() {
  if (loaded) return;
  dotenv.config({ path: ENV_FILE });
  loaded = true;
}

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  ROW_STORE: z.enum(["memory", "csv"]).default("csv"),
  DATA_DIR: z.string().min(1).default("./data"),
  ALLOWED_ORIGINS: z
    .string()
    .default("")
    .transform((s) =>
      s
        .split(",")
        .map((o) => o.trim())
        .filter(Boolean)
    ),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Parses configuration from the given environment (process.env by default).
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) loadEnvFile();

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
