import pino from "pino";

const levels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

type LogLevel = (typeof levels)[number];

const isLogLevel = (value: string): value is LogLevel =>
  levels.some((level) => level === value);

const resolveLevel = (): LogLevel => {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  if (process.env.NODE_ENV === "test") {
    return "silent";
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
};

export const logger = pino({
  name: "fundamentals-sync",
  level: resolveLevel(),
});

export type Logger = typeof logger;

/**
 * Flattens unknown throwables into a loggable shape without losing the stack.
 */
export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
