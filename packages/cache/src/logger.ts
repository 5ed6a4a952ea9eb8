import pino, { type Logger } from "pino";
import { logLevelSchema, type LogLevel } from "./config";

export type { Logger } from "pino";

/**
 * Level named by `LOG_LEVEL`, or `info` when it is unset or not a pino level.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(value?.trim());
  return parsed.success ? parsed.data : "info";
}

// Base logger (JSON). Pretty printing is left to whoever consumes the stream.
export const logger: Logger = pino({
  name: "keyhold",
  level: resolveLogLevel(process.env.LOG_LEVEL)
});

/**
 * Child logger bound to a component name and any extra fields.
 */
export function createLogger(component: string, bindings?: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child({ component, ...(bindings ?? {}) });
}
