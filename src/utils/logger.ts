/**
 * Structured logging utility using pino
 *
 * - Environment-based log levels
 * - Pretty printing outside production
 * - Component-based context
 *
 * Logs always go to stderr: stdout carries CLI output.
 */

import pino from 'pino';
import { config } from '../config/index.js';

// Keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const pinoOptions: pino.LoggerOptions = {
  level: config.logging.level,
  enabled: !isTest,
  redact: {
    paths: ['password', 'secret', 'token', '*.password', '*.secret', '*.token'],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

const usePretty = !isTest && config.runtime.nodeEnv !== 'production' && config.logging.pretty;

export const logger = usePretty
  ? pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(pinoOptions, pino.destination({ dest: 2, sync: true }));

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'voting', 'opinions')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
