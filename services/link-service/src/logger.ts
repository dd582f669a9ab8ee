import pino, { type Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((l) => l === s);
}

export function createLogger(level: LogLevel): Logger {
  return pino({ name: "link-service", level });
}
