/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to environment variables.
 * Parsed once on first access and cached for the life of the process.
 */

import { z } from "zod";

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Comma-separated list, trimmed, empties dropped. Undefined stays undefined.
 */
const commaList = z
  .union([z.string(), z.undefined()])
  .transform((val) => {
    if (val === undefined) return undefined;
    const items = val
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
    return items.length > 0 ? items : undefined;
  });

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(8000),
    host: z.string().default("0.0.0.0"),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024), // 1 MB
    routeTimeoutMs: z.coerce.number().int().positive().default(30000),
  }),

  cors: z.object({
    frontendUrl: z.string().default("http://localhost:3000"),
    allowedOrigins: commaList,
  }),

  rateLimits: z.object({
    globalRpm: z.coerce.number().int().positive().default(120),
  }),

  observability: z.object({
    infoSampleRate: z.coerce.number().min(0).max(1).default(1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      routeTimeoutMs: env.ROUTE_TIMEOUT_MS,
    },
    cors: {
      frontendUrl: env.FRONTEND_URL,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    rateLimits: {
      globalRpm: env.GLOBAL_RATE_LIMIT_RPM,
    },
    observability: {
      infoSampleRate: env.INFO_SAMPLE_RATE,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return result.data;
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing the environment on first call.
 *
 * ```
 * import { getConfig } from './config/index.js';
 * const port = getConfig().server.port;
 * ```
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * Clears the cache so the next access re-reads the environment.
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

/**
 * Resolve the CORS allow-list.
 *
 * ALLOWED_ORIGINS wins when set; otherwise the single FRONTEND_URL origin.
 * A wildcard origin is refused in production.
 */
export function resolveAllowedOrigins(config: Config = getConfig()): string[] {
  const origins = config.cors.allowedOrigins ?? [config.cors.frontendUrl];

  if (
    config.server.nodeEnv === "production" &&
    origins.some((origin) => origin === "*" || origin === '"*"')
  ) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return origins;
}
