import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { isValidTimeZone } from "@shared/date-utils";

loadDotenv();

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const normalized = value.trim().toLowerCase();
      if (["true", "1", "yes"].includes(normalized)) return true;
      if (["false", "0", "no"].includes(normalized)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a boolean flag, received "${value}"`,
      });
      return z.NEVER;
    });

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  DATABASE_URL: optionalString,
  USE_IN_MEMORY_DB: booleanFlag(false),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  DB_SLOW_THRESHOLD_MS: z.coerce.number().int().min(0).default(200),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  LOG_FILE_PATH: optionalString,
  LOG_TO_STDOUT: booleanFlag(true),
  PROMOTIONS_TIME_ZONE: optionalString.refine(
    (value) => value === undefined || isValidTimeZone(value),
    { message: "Unknown IANA time zone" },
  ),
  ALLOWED_ORIGINS: optionalString,
});

export type AppConfig = {
  nodeEnv: "development" | "production" | "test";
  isProduction: boolean;
  port: number;
  host: string;
  database: {
    url?: string;
    useInMemory: boolean;
    poolSize: number;
    slowThresholdMs: number;
  };
  log: {
    level: string;
    filePath?: string;
    toStdout: boolean;
  };
  timeZone?: string;
  allowedOrigins: string[];
};

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Configuration validation failed:\n${problems.join("\n")}`);
    this.name = "ConfigError";
  }
}

const logEnvSchema = envSchema.pick({
  NODE_ENV: true,
  LOG_LEVEL: true,
  LOG_FILE_PATH: true,
  LOG_TO_STDOUT: true,
});

/**
 * Logging settings alone, so the logger can start before the rest of the
 * configuration is known to be valid.
 */
export function loadLogConfig(env: NodeJS.ProcessEnv = process.env): AppConfig["log"] {
  const parsed = logEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return {
    level: parsed.data.LOG_LEVEL ?? (parsed.data.NODE_ENV === "test" ? "silent" : "info"),
    filePath: parsed.data.LOG_FILE_PATH,
    toStdout: parsed.data.LOG_TO_STDOUT,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  const isTest = values.NODE_ENV === "test";
  const useInMemory = isTest || values.USE_IN_MEMORY_DB;

  if (!useInMemory && !values.DATABASE_URL) {
    throw new ConfigError([
      "DATABASE_URL: required unless USE_IN_MEMORY_DB=true",
    ]);
  }

  return {
    nodeEnv: values.NODE_ENV,
    isProduction: values.NODE_ENV === "production",
    port: values.PORT,
    host: values.HOST,
    database: {
      url: values.DATABASE_URL,
      useInMemory,
      poolSize: values.DB_POOL_SIZE,
      slowThresholdMs: values.DB_SLOW_THRESHOLD_MS,
    },
    log: loadLogConfig(env),
    timeZone: values.PROMOTIONS_TIME_ZONE,
    allowedOrigins: (values.ALLOWED_ORIGINS ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}
