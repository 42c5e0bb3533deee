import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger };

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw) {
    if (!isLogLevel(raw)) {
      throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}. Received: ${env.LOG_LEVEL}`);
    }
    return raw;
  }
  return env.NODE_ENV === "test" ? "silent" : "info";
};

/**
 * JSON logger; every record carries an `event` key, e.g.
 *   logger.warn({ event: "http.retry", attempt, maxAttempts }, "retrying request");
 */
export const createLogger = (
  options: { level?: LogLevel; name?: string } = {},
  destination?: DestinationStream
): Logger => {
  const config = {
    name: options.name ?? "animal-etl",
    level: options.level ?? resolveLogLevel(),
    timestamp: pino.stdTimeFunctions.isoTime
  };
  return destination ? pino(config, destination) : pino(config);
};

const initialLevel = (env: NodeJS.ProcessEnv): LogLevel => {
  const raw = env.LOG_LEVEL?.trim().toLowerCase() ?? "";
  if (isLogLevel(raw)) return raw;
  return env.NODE_ENV === "test" ? "silent" : "info";
};

// An invalid LOG_LEVEL is reported by config loading, which then sets the level.
export const rootLogger: Logger = createLogger({ level: initialLevel(process.env) });
