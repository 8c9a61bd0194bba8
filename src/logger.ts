import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

export function createLogger(
  options: { name?: string; level?: LogLevel; destination?: DestinationStream } = {}
): Logger {
  const loggerOptions = {
    name: options.name ?? "external-task-worker",
    level: options.level ?? parseLogLevel(process.env.LOG_LEVEL),
  };
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
