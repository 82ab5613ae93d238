import pino from "pino";
import type { Logger } from "pino";

const NODE_ENV = process.env.NODE_ENV ?? "development";
const isProduction = NODE_ENV === "production";

function defaultLevel(): string {
  if (isProduction) {
    return "info";
  }
  // Vitest sets NODE_ENV=test.
  return NODE_ENV === "test" ? "silent" : "debug";
}

const LOG_LEVEL = process.env.LOG_LEVEL || defaultLevel();

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,

  ...(isProduction ? { timestamp: pino.stdTimeFunctions.isoTime } : {}),

  base: {
    pid: process.pid,
    service: "seekable-byte-store",
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

/** Package-wide base logger. */
export const logger: Logger = pino(baseConfig);

/** Creates a child logger tagged with the component name. */
export const createLogger = (
  component: string,
  context?: Record<string, unknown>,
): Logger => {
  return logger.child({ component, ...context });
};

export const seekBufferLogger = createLogger("seek-buffer");
export const transactionLogger = createLogger("transaction");
export const fileSyncLogger = createLogger("file-sync");
export const bufferFilesLogger = createLogger("buffer-files");

/** Logs an error with its structured context at error level. */
export const logError = (
  target: Logger,
  error: unknown,
  context?: Record<string, unknown>,
): void => {
  if (error instanceof Error) {
    target.error({ err: error, ...context }, error.message);
  } else {
    target.error({ error: String(error), ...context }, "Unknown error occurred");
  }
};

export type { Logger };
