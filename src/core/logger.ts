import pino, { type Level, type Logger, type LoggerOptions } from "pino";

export const LOG_LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

export function isLogLevel(value: string): value is Level {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Creates a Pino logger instance with optional pretty printing and verbosity.
 * An explicit `level` wins over `verbose`.
 */
export function createLogger(
  options?: LoggerOptions & { pretty?: boolean; verbose?: boolean },
): Logger {
  const { pretty = true, verbose = false, level, ...pinoOptions } = options ?? {};
  const transport = pretty
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: true,
        },
      }
    : undefined;
  return pino({
    name: "solstice",
    level: level ?? (verbose ? "debug" : "info"),
    transport,
    ...pinoOptions,
  });
}
