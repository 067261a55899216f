import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../schemas/server-config.js";

export type { Logger } from "pino";

export const LOGGER_NAME = "request-authority";

export function createLogger(
  config: LoggingConfig,
  bindings?: Record<string, unknown>,
): Logger {
  const usePretty = config.pretty || process.env.NODE_ENV !== "production";

  return pino({
    name: LOGGER_NAME,
    level: config.level,
    ...(bindings ? { base: { pid: process.pid, ...bindings } } : {}),
    ...(usePretty ? { transport: { target: "pino-pretty" } } : {}),
  });
}
