/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with a per-operation timer.
 * Logs always go to stderr so stdout stays free for the release summary.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerSettings {
  level?: string;
  pretty?: boolean;
}

const REDACTED_PATHS = [
  'password',
  'token',
  'secret',
  'auth',
  'credentials',
  '*.password',
  '*.token',
  '*.secret',
];

/**
 * Pino options for the release CLI; `pretty` adds the pino-pretty transport
 */
export function loggerOptions(settings: LoggerSettings = {}): pino.LoggerOptions {
  const pretty = settings.pretty ?? process.env.NODE_ENV === 'development';

  const options: pino.LoggerOptions = {
    name: 'piper-release',
    level:
      settings.level ??
      process.env.LOG_LEVEL ??
      (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (!pretty) {
    return options;
  }

  return {
    ...options,
    transport: {
      target: 'pino-pretty',
      options: {
        destination: 2,
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

/**
 * Create a Pino logger writing to stderr
 */
export function createLogger(settings: LoggerSettings = {}): pino.Logger {
  const options = loggerOptions(settings);

  if (options.transport) {
    return pino(options);
  }

  return pino(options, pino.destination(2));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
      return duration;
    },
  };
}
