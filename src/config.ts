import "dotenv/config";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DATABASE_PATH: z.string().min(1).default("tasks.db"),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  DB_RESET_ON_START: booleanFlag,
  SESSION_SECRET: z.string().min(1).default("dev-secret"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("debug"),
  LOG_FILE: z.string().default("task_tracker.log"),
  LOG_ROTATE_SIZE: z.string().min(1).default("10M"),
  LOG_ROTATE_INTERVAL: z.string().min(1).default("1d"),
  LOG_MAX_FILES: z.coerce.number().int().min(1).default(5),
  LOG_FORMAT: z.string().min(1).default("dev"),
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  host: string;
  database: {
    path: string;
    busyTimeoutMs: number;
    resetOnStart: boolean;
  };
  sessionSecret: string;
  log: {
    level: LogLevel;
    file: string | null;
    rotateSize: string;
    rotateInterval: string;
    maxFiles: number;
    httpFormat: string;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Reads the application configuration from environment variables.
 * Called once at startup; the result is passed down explicitly.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  return Object.freeze({
    env: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    database: {
      path: e.DATABASE_PATH,
      busyTimeoutMs: e.DB_BUSY_TIMEOUT_MS,
      resetOnStart: e.DB_RESET_ON_START,
    },
    sessionSecret: e.SESSION_SECRET,
    log: {
      level: e.LOG_LEVEL,
      file: e.LOG_FILE.trim() ? e.LOG_FILE.trim() : null,
      rotateSize: e.LOG_ROTATE_SIZE,
      rotateInterval: e.LOG_ROTATE_INTERVAL,
      maxFiles: e.LOG_MAX_FILES,
      httpFormat: e.LOG_FORMAT,
    },
  });
}
