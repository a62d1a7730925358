/**
 * Logger
 * 
 * Pino-based structured logger shared by every workspace.
 * Always writes to stderr: stdout belongs to the CLI's report.
 */

import pino, { type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface BaseLoggerOptions {
  level?: LogLevel | string;
  service?: string;
  env?: string;
}

export function createBaseLogger(options: BaseLoggerOptions = {}) {
  const env = options.env ?? process.env['NODE_ENV'] ?? 'production';

  const pinoOptions: LoggerOptions = {
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'warn',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: options.service ?? 'vmerger',
      env,
    },
  };

  if (env === 'development') {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

export const logger = createBaseLogger();

export type Logger = ReturnType<typeof createBaseLogger>;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}
