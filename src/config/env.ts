import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { type LogLevel, parseLogLevel } from "./logger.ts";

/**
 * Resolved application configuration
 */
export interface AppConfig {
  readonly host: string;
  readonly port: number;
  readonly requestTimeoutMs: number;
  readonly cacheMaxSizeMb: number;
  readonly cacheEntryTtlMs: number;
  readonly logLevel: LogLevel;
  readonly googleApiKey: string;
}

/**
 * Command-line values; each one wins over its environment variable
 */
export interface ConfigOverrides {
  readonly listen?: string;
  readonly timeout?: string;
  readonly cacheMaxSizeMb?: string;
  readonly cacheEntryTtl?: string;
  readonly logLevel?: string;
}

export type ConfigError = {
  type: "config";
  message: string;
  issues: string[];
};

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};
const DURATION_PATTERN = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h))+$/;
const DURATION_SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

/**
 * Parses durations such as "300ms", "1s", "10m" or "1h30m" into milliseconds.
 * A bare "0" is accepted; any other number needs a unit.
 */
export function parseDuration(value: string): Result<number, string> {
  const trimmed = value.trim();
  if (trimmed === "0") {
    return ok(0);
  }
  if (!DURATION_PATTERN.test(trimmed)) {
    return err(`invalid duration "${value}"`);
  }

  let total = 0;
  for (const [, amount, unit] of trimmed.matchAll(DURATION_SEGMENT)) {
    total += Number(amount) * DURATION_UNITS[unit];
  }
  return ok(Math.round(total));
}

/**
 * Splits "host:port" or ":port" into its parts.
 */
export function parseListenAddress(
  value: string,
): Result<{ host?: string; port: string }, string> {
  const separator = value.lastIndexOf(":");
  if (separator < 0) {
    return err(`invalid listen address "${value}", expected host:port`);
  }

  const host = value.slice(0, separator).replace(/^\[(.*)\]$/, "$1");
  return ok({ host: host || undefined, port: value.slice(separator + 1) });
}

const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const durationSchema = z.string().transform((value, ctx) => {
  const parsed = parseDuration(value).andThen((ms): Result<number, string> =>
    ms > 0 ? ok(ms) : err("duration must be positive")
  );
  if (parsed.isErr()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
    return z.NEVER;
  }
  return parsed.value;
});

const logLevelSchema = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level "${value}"` });
    return z.NEVER;
  }
  return level;
});

const envSchema = z.object({
  HOST: z.preprocess(emptyAsUndefined, z.string().default("0.0.0.0")),
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).max(65535).default(8080)),
  REQUEST_TIMEOUT: z.preprocess(emptyAsUndefined, durationSchema.default("1s")),
  CACHE_MAX_SIZE_MB: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).default(64)),
  CACHE_ENTRY_TTL: z.preprocess(emptyAsUndefined, durationSchema.default("10m")),
  LOG_LEVEL: z.preprocess(emptyAsUndefined, logLevelSchema.default("info")),
  GOOGLE_API_KEY: z.preprocess(emptyAsUndefined, z.string().default("")),
});

/**
 * Load configuration from environment variables, with command-line overrides applied on top
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): Result<AppConfig, ConfigError> {
  const raw: Record<string, string | undefined> = {
    HOST: env.HOST,
    PORT: env.PORT,
    REQUEST_TIMEOUT: overrides.timeout ?? env.REQUEST_TIMEOUT,
    CACHE_MAX_SIZE_MB: overrides.cacheMaxSizeMb ?? env.CACHE_MAX_SIZE_MB,
    CACHE_ENTRY_TTL: overrides.cacheEntryTtl ?? env.CACHE_ENTRY_TTL,
    LOG_LEVEL: overrides.logLevel ?? env.LOG_LEVEL,
    GOOGLE_API_KEY: env.GOOGLE_API_KEY,
  };

  if (overrides.listen !== undefined) {
    const listen = parseListenAddress(overrides.listen);
    if (listen.isErr()) {
      return err({ type: "config", message: "Invalid configuration", issues: [listen.error] });
    }
    raw.HOST = listen.value.host ?? raw.HOST;
    raw.PORT = listen.value.port;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    return err({
      type: "config",
      message: "Invalid configuration",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const values = parsed.data;
  return ok({
    host: values.HOST,
    port: values.PORT,
    requestTimeoutMs: values.REQUEST_TIMEOUT,
    cacheMaxSizeMb: values.CACHE_MAX_SIZE_MB,
    cacheEntryTtlMs: values.CACHE_ENTRY_TTL,
    logLevel: values.LOG_LEVEL,
    googleApiKey: values.GOOGLE_API_KEY,
  });
}
