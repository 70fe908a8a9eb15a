import path from "path";
import { createLogger, format, transports, type Logger } from "winston";

const LOG_DIR = process.env.LOG_DIR || "logs";
const IS_TEST = process.env.NODE_ENV === "test";

// Winston logger shared by every component; tests run it silent
const logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: IS_TEST,
  format: format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.errors({ stack: true }),
    format.splat(),
    format.json(),
  ),
  defaultMeta: { service: "career-guidance-ai" },
  transports: IS_TEST
    ? []
    : [
        new transports.File({
          filename: path.join(LOG_DIR, "error.log"),
          level: "error",
        }),
        new transports.File({ filename: path.join(LOG_DIR, "combined.log") }),
      ],
});

// Human-readable console output outside production
if (process.env.NODE_ENV !== "PRODUCTION") {
  logger.add(
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.printf(({ level, message, timestamp, component, ...metadata }) => {
          const scope = typeof component === "string" ? ` (${component})` : "";
          let msg = `${timestamp} [${level}]${scope}: ${message}`;
          if (Object.keys(metadata).length > 0) {
            msg += ` ${JSON.stringify(metadata)}`;
          }
          return msg;
        }),
      ),
    }),
  );
}

/**
 * Child logger tagging every record with the emitting component,
 * e.g. `componentLogger("llm-gateway")`.
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
