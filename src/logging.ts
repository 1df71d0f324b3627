import { Logger } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogFormat = "pretty" | "json";

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_MAP, value);
}

export function resolveLogLevel(envLevel: string | undefined): number {
  const normalized = envLevel?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return LOG_LEVEL_MAP[normalized];
  }
  return LOG_LEVEL_MAP.info;
}

export function resolveLogFormat(envFormat: string | undefined): LogFormat {
  return envFormat?.trim().toLowerCase() === "json" ? "json" : "pretty";
}

export type AppLogger = Logger<unknown>;

export function createLogger(name: string, minLevel?: LogLevel): AppLogger {
  return new Logger({
    name,
    type: resolveLogFormat(process.env.LOG_FORMAT),
    minLevel: minLevel ? LOG_LEVEL_MAP[minLevel] : resolveLogLevel(process.env.LOG_LEVEL),
    prettyLogTemplate: "{{dateIsoStr}} {{logLevelName}} [{{name}}] ",
  });
}

