import pino from "pino";

export type Logger = pino.Logger;

/** Credentials that may ride along in request options or settings. */
const REDACTED_PATHS = ["token", "bearerToken", "*.token", "*.bearerToken", "headers.Authorization"];

let loggerInstance: pino.Logger | null = null;

export function createLogger(verbose = false, destination?: pino.DestinationStream): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "discovery",
    level: verbose ? "debug" : "info",
    redact: REDACTED_PATHS,
    serializers: { err: pino.stdSerializers.err },
  };
  if (destination) return pino(options, destination);

  return pino({
    ...options,
    transport: verbose
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  });
}

export function getLogger(verbose = false): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger(verbose);
  }
  return loggerInstance;
}

/**
 * Child logger whose lines carry the platform they came from.
 */
export function sourceLogger(logger: Logger, source: string): Logger {
  return logger.child({ source });
}
