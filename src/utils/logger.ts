import pino, { Logger } from 'pino';

/**
 * Application logger using Pino
 *
 * - Structured JSON logging in production
 * - Pretty printing during local development
 * - Child loggers carry a component name
 */

const environment = process.env.NODE_ENV || 'development';
const usePrettyOutput = environment !== 'production' && environment !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',

  // Pretty print in development, JSON in production
  transport: usePrettyOutput ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env: environment,
  },
});

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
