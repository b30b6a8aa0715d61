/**
 * Base Logger Configuration
 *
 * Pino logger shared by every package. Level comes from LOG_LEVEL, falling
 * back to a per-environment default.
 */

import { pino, type Logger as PinoLogger, type LoggerOptions } from "pino";

const LOG_LEVELS = {
  development: "debug",
  production: "info",
  test: "silent",
} as const;

function isKnownEnv(env: string): env is keyof typeof LOG_LEVELS {
  return env in LOG_LEVELS;
}

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL = process.env.LOG_LEVEL || (isKnownEnv(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : "info");

const loggerConfig: LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

export const logger = pino(loggerConfig);

export type Logger = PinoLogger;
