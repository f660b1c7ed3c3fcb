/**
 * Logging utility using Pino
 */

import pino, { type Logger } from 'pino';
import { appConfig } from './config.js';

function resolveLevel(): string {
  if (appConfig.nodeEnv === 'test') return 'silent';
  return appConfig.logLevel ?? 'debug';
}

/**
 * Create logger instance with environment-specific configuration
 */
export const logger = pino({
  level: resolveLevel(),
  transport:
    appConfig.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
});

export type { Logger };

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Merge object for extra helper arguments: a lone Error goes under `err`
 * so pino serializes it, anything else under `args`
 */
export function logContext(args: unknown[]): Record<string, unknown> {
  if (args.length === 0) return {};
  const [first] = args;
  if (args.length === 1 && first instanceof Error) return { err: first };
  return { args };
}

export const logInfo = (message: string, ...args: unknown[]) => logger.info(logContext(args), message);
export const logError = (message: string, error?: Error | unknown, ...args: unknown[]) => {
  if (error instanceof Error) {
    logger.error({ ...logContext(args), err: error }, message);
  } else {
    logger.error({ ...logContext(args), error }, message);
  }
};
export const logWarn = (message: string, ...args: unknown[]) => logger.warn(logContext(args), message);
export const logDebug = (message: string, ...args: unknown[]) => logger.debug(logContext(args), message);
export const logSuccess = (message: string, ...args: unknown[]) =>
  logger.info({ ...logContext(args), success: true }, `✅ ${message}`);
