import { z } from "zod";
import { CacheConfigError } from "./errors";

export const DEFAULT_MAX_ENTRIES = 10_000;

export const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const cacheConfigSchema = z.object({
  maxEntries: z.coerce.number().int().positive().default(DEFAULT_MAX_ENTRIES),
  /**
   * Level for the provider's logger. Unset inherits the parent logger's level.
   */
  logLevel: logLevelSchema.optional()
});

export type CacheConfig = z.infer<typeof cacheConfigSchema>;
export type CacheConfigInput = z.input<typeof cacheConfigSchema>;

export function parseCacheConfig(input: unknown = {}): CacheConfig {
  const result = cacheConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const firstIssue = result.error.issues[0];
  const field = firstIssue?.path.join(".");
  const message = firstIssue ? firstIssue.message : "Invalid cache configuration";
  throw new CacheConfigError(field ? `${field}: ${message}` : message);
}

/**
 * Reads `CACHE_MAX_ENTRIES` and `LOG_LEVEL`. Unset or blank variables fall back to defaults.
 */
export function loadCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  return parseCacheConfig({
    maxEntries: blankToUndefined(env.CACHE_MAX_ENTRIES),
    logLevel: blankToUndefined(env.LOG_LEVEL)
  });
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
