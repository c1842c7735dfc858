import pino from "pino";

/**
 * Creates the run logger: structured JSON with string level labels and
 * ISO 8601 timestamps.
 *
 * Level comes from `level`, then `LOG_LEVEL`, then `info`. Output goes to
 * stdout unless a destination stream is given.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
