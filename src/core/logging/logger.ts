import pino from "pino";
import { createFormatterStream, type LogFormat } from "./formatter";
import { getSanitizeOptionsFromEnv, sanitizeForLogging } from "./sanitizer";

/**
 * Structured logging with Pino.
 *
 * - JSON output in production
 * - compact/hybrid/minimal single-process formats in development (LOG_FORMAT)
 * - pino-pretty for LOG_FORMAT=pretty
 * - element payloads are truncated before they reach the output (LOG_SANITIZE)
 */

const isDev = process.env.NODE_ENV !== "production";
const sanitizeEnabled = process.env.LOG_SANITIZE !== "false";
const sanitizeOptions = getSanitizeOptionsFromEnv();
const logFormat = parseLogFormat(process.env.LOG_FORMAT);

function parseLogFormat(value: string | undefined): LogFormat | "pretty" {
  switch (value) {
    case "hybrid":
    case "minimal":
    case "pretty":
      return value;
    default:
      return "compact";
  }
}

const baseConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || "info",
  messageKey: "msg",
  timestamp: pino.stdTimeFunctions.isoTime,

  base: isDev
    ? null
    : {
        service: "stream-materializer",
        version: process.env.npm_package_version || "0.0.0",
        pid: process.pid,
      },

  serializers: {
    err: pino.stdSerializers.err,
    cause: pino.stdSerializers.err,
  },

  formatters: {
    log(obj: Record<string, unknown>) {
      if (!sanitizeEnabled) return obj;
      const sanitized = sanitizeForLogging(obj, sanitizeOptions);
      return isRecord(sanitized) ? sanitized : obj;
    },
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const baseLogger: pino.Logger = isDev
  ? logFormat === "pretty"
    ? pino({
        ...baseConfig,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      })
    : pino(baseConfig, createFormatterStream(logFormat))
  : pino(baseConfig);

export interface LogContext {
  /** Materialization the logger belongs to */
  materializationId?: string;
  /** Stage name within the materialization */
  stage?: string;
  [key: string]: unknown;
}

export type Logger = pino.Logger;

export function createLogger(component: string, context?: LogContext): Logger {
  return baseLogger.child({
    component,
    ...context,
  });
}

export { baseLogger as logger };
