/**
 * Pino logger for pipeline diagnostics.
 *
 * Console output is reserved for the review table, so log lines go to stderr.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || 'warn',
  base: {
    service: 'pdf-renamer',
  },
};

export const logger: Logger =
  process.env.NODE_ENV === 'development'
    ? pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname,service',
            destination: 2,
          },
        },
      })
    : pino(options, pino.destination(2));

/**
 * Create child logger scoped to one document
 */
export function createDocumentLogger(filePath: string): Logger {
  return logger.child({ file: filePath });
}
