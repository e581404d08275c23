/**
 * Service Logging
 *
 * Structured logging for the services layer, built on pino.
 * Each service gets a child logger carrying its name.
 */

import { pino, type Logger } from 'pino';
import { loggingEnvSchema, parseEnv } from '../config/env.js';

export type ServiceLogger = Logger;

const env = parseEnv(loggingEnvSchema, process.env);

export const logger: Logger = pino({
  name: 'currency-mapping',
  level: env.LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

/**
 * Create a child logger for a service
 */
export function createServiceLogger(service: string): ServiceLogger {
  return logger.child({ service });
}

/**
 * Structured log helpers for common service events
 */
export const log = {
  methodEntry: (logger: ServiceLogger, method: string, params?: Record<string, unknown>) => {
    logger.debug({ method, ...params }, `${method} called`);
  },

  methodExit: (logger: ServiceLogger, method: string, result?: Record<string, unknown>) => {
    logger.debug({ method, ...result }, `${method} completed`);
  },

  methodError: (
    logger: ServiceLogger,
    method: string,
    error: unknown,
    context?: Record<string, unknown>
  ) => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(
      { method, err, errorName: err.name, ...context },
      `${method} failed: ${err.message}`
    );
  },

  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params?: Record<string, unknown>
  ) => {
    logger.debug({ api, endpoint, ...params }, `External call: ${api} ${endpoint}`);
  },
};
