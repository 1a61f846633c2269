import pino from "pino";
import { getEnv } from "../config/env.js";

const env = getEnv();

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "dog-meal-planner" },
  transport: env.LOG_PRETTY
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service",
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type ModuleLogger = pino.Logger;

/** Logger bound to a service module, e.g. `createChildLogger("foodSearch")`. */
export function createChildLogger(module: string, context: Record<string, unknown> = {}): ModuleLogger {
  return logger.child({ module, ...context });
}

export type CompletedRequest = {
  method: string;
  url: string;
  statusCode: number;
  responseTimeMs: number;
  userAgent?: string;
};

export function requestLogLevel(statusCode: number): "info" | "warn" | "error" {
  if (statusCode >= 500) return "error";
  if (statusCode >= 400) return "warn";
  return "info";
}

export function logRequestCompleted(request: CompletedRequest): void {
  logger[requestLogLevel(request.statusCode)]({ msg: "Request completed", ...request });
}
