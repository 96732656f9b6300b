import pino from "pino";
import { createFormatterStream, type LogFormat } from "./formatter";
import { getSanitizeOptionsFromEnv, sanitizeLogObject } from "./sanitizer";

/**
 * Structured logging with Pino.
 *
 * - Everything goes to stderr: stdout carries pipeline output
 * - JSON output in production for machine parsing
 * - Compact, readable formats for development (via LOG_FORMAT)
 * - Record contents in log fields are truncated by the sanitizer
 */

const isDev = process.env.NODE_ENV !== "production";
const sanitizeEnabled = process.env.LOG_SANITIZE !== "false";
const sanitizeOptions = getSanitizeOptionsFromEnv();
const logFormat = process.env.LOG_FORMAT || "compact";

function isLogFormat(value: string): value is LogFormat {
  return value === "compact" || value === "hybrid" || value === "minimal";
}

const baseConfig = {
  level: process.env.LOG_LEVEL || "info",

  messageKey: "msg",
  timestamp: pino.stdTimeFunctions.isoTime,

  base: isDev
    ? null
    : {
        service: "linewise",
        version: process.env.npm_package_version || "0.0.0",
        pid: process.pid,
      },

  serializers: {
    err: pino.stdSerializers.err,
  },

  formatters: {
    log(obj: Record<string, unknown>) {
      if (!sanitizeEnabled) return obj;
      return sanitizeLogObject(obj, sanitizeOptions);
    },
  },
};

function createBaseLogger(): pino.Logger {
  if (!isDev) {
    return pino(baseConfig, pino.destination(2));
  }

  if (logFormat === "pretty") {
    return pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseConfig, createFormatterStream(isLogFormat(logFormat) ? logFormat : "compact"));
}

const baseLogger = createBaseLogger();

export interface LogContext {
  [key: string]: unknown;
}

export type Logger = pino.Logger;

// Children copy the parent's level when created, so level changes are fanned out
const children: Logger[] = [];

export function createLogger(component: string, context?: LogContext): Logger {
  const child = baseLogger.child({
    component,
    ...context,
  });
  children.push(child);
  return child;
}

/** Change the level of the base logger and every component logger. */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

