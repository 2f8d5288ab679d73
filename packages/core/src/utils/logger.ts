/**
 * Structured Logger Utility
 * Uses Pino for structured logging. The terminal owns stdout, so log lines go
 * to a file instead.
 */

import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

const DEFAULT_LOG_FILE = path.join(os.homedir(), '.cache', 'playdeck', 'playdeck.log');

function createRootLogger(): Logger {
  const isTest = process.env.NODE_ENV === 'test';
  const level = isTest ? 'silent' : (process.env.PLAYDECK_LOG_LEVEL ?? 'info');

  if (isTest) {
    return pino({ level });
  }

  const file = process.env.PLAYDECK_LOG_FILE ?? DEFAULT_LOG_FILE;
  fs.mkdirSync(path.dirname(file), { recursive: true });

  const options: pino.LoggerOptions = {
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (process.env.PLAYDECK_LOG_PRETTY === '1') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: false,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: file,
          mkdir: true,
        },
      },
    });
  }

  return pino(options, pino.destination({ dest: file, sync: false, mkdir: true }));
}

/**
 * Root logger instance
 */
export const logger = createRootLogger();

/**
 * Create child logger for one component
 */
export function createLogger(component: string, context?: Record<string, unknown>): Logger {
  return logger.child({ component, ...context });
}

/**
 * Log an outgoing API request
 */
export function logRequest(method: string, url: string, attempt = 1) {
  logger.debug(
    {
      type: 'request',
      method,
      url,
      attempt,
    },
    `${method} ${url}`
  );
}

/**
 * Log errors with context
 */
export function logError(error: unknown, context?: Record<string, unknown>) {
  logger.error(
    {
      type: 'error',
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...context,
    },
    'Error occurred'
  );
}

/**
 * Flush buffered log lines, used right before the process exits
 */
export function flushLogs(): void {
  logger.flush();
}
