import pino from "pino";

/**
 * Creates the pino logger shared by every pipeline stage.
 *
 * - Level printed as its string label, timestamps in ISO 8601
 * - Level taken from `LOG_LEVEL`, defaults to `info`
 * - Plain JSON on stdout, no transport
 *
 * @param level - Overrides `LOG_LEVEL` when given
 * @param destination - Defaults to stdout
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "tagesbrief",
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
