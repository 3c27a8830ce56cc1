/**
 * API configuration, validated with zod at startup.
 */

import { z } from "zod";
import type { Logger } from "@snaplink/logger";

const intFromEnv = (defaultValue: number) => z.coerce.number().int().nonnegative().default(defaultValue);

export const configSchema = z
  .object({
    PORT: intFromEnv(3000),
    HOST: z.string().default("0.0.0.0"),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),

    STORAGE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().url().optional(),
    DB_TIMEOUT_MS: intFromEnv(2000),
    REDIS_URL: z.string().url().optional(),
    REDIS_TIMEOUT_MS: intFromEnv(50),

    MACHINE_ID: z.coerce.number().int().min(0).max(1023).optional(),
    CODE_EPOCH: z.coerce.number().int().nonnegative().optional(),

    ANALYTICS_ENABLED: z
      .enum(["true", "false"])
      .default("false")
      .transform((value) => value === "true"),
    SHORT_URL_BASE: z.string().url().default("http://localhost:3002"),
    CORS_ORIGIN: z.string().optional(),
    RATE_LIMIT_MAX: intFromEnv(100),
    /** 0 turns the expiry sweep off */
    EXPIRY_SWEEP_INTERVAL_MS: intFromEnv(60_000),
    EXPIRY_SWEEP_BATCH: z.coerce.number().int().min(1).max(1000).default(100),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER !== "postgres") return;
    for (const key of ["DATABASE_URL", "REDIS_URL"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when STORAGE_DRIVER is postgres`,
        });
      }
    }
  });

export type ApiConfig = z.infer<typeof configSchema>;

/**
 * Parse and validate `env`.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ApiConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  return result.data;
}

/**
 * Log warnings for suboptimal settings.
 */
export function validateConfig(config: ApiConfig, logger: Logger): void {
  if (config.NODE_ENV === "production" && config.STORAGE_DRIVER === "memory") {
    logger.warn("STORAGE_DRIVER=memory in production; links are lost on restart");
  }
  if (config.ANALYTICS_ENABLED && !config.REDIS_URL) {
    logger.warn("ANALYTICS_ENABLED needs REDIS_URL; analytics will stay off");
  }
  if (config.MACHINE_ID === undefined) {
    logger.warn("MACHINE_ID not set; deriving it from the hostname");
  }
}
