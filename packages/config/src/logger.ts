import pino from 'pino';
import type { LogLevel, LogFormat } from './schema.js';

/** File descriptor logs are written to: 1 stdout, 2 stderr */
export type LogDestination = 1 | 2;

/**
 * pino options shared by standalone loggers and Fastify
 */
export function loggerOptions(
  level: LogLevel = 'info',
  format: LogFormat = 'pretty',
  destination: LogDestination = 1,
): pino.LoggerOptions {
  return {
    level,
    ...(format === 'pretty' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination,
        },
      },
    }),
  };
}

/**
 * Create a configured logger instance. The CLI logs to stderr so its
 * stdout stays machine-readable.
 */
export function createLogger(
  level: LogLevel = 'info',
  format: LogFormat = 'pretty',
  destination: LogDestination = 1,
): pino.Logger {
  const options = loggerOptions(level, format, destination);
  return options.transport ? pino(options) : pino(options, pino.destination(destination));
}
