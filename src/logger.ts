import { createLogger, format, transports, Logger } from "winston";

const defaultLevel = process.env.NODE_ENV === "test" ? "warn" : "info";

/** Console logger whose lines carry the module tag, e.g. [SESSION]. */
export function createModuleLogger(tag: string): Logger {
  return createLogger({
    level: process.env.LOG_LEVEL || defaultLevel,
    format: format.combine(
      format.timestamp(),
      format.printf(
        ({ timestamp, level, message }) =>
          `${timestamp} [${level.toUpperCase()}] [${tag}] ${message}`
      )
    ),
    transports: [new transports.Console()],
  });
}
