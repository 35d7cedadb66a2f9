/**
 * Logger factory for projection services
 */

import pino from 'pino';

export interface ProjectionLoggerOptions {
  /** Logger name. Default: 'projection' */
  name?: string;
  /** Default: LOG_LEVEL or 'info' */
  level?: string;
  /** Pretty-print through pino-pretty. Default: false */
  pretty?: boolean;
}

/**
 * Create a pino logger, optionally pretty-printed
 */
export function createLogger(options: ProjectionLoggerOptions = {}): pino.Logger {
  const { name = 'projection', level = process.env.LOG_LEVEL ?? 'info', pretty = false } = options;

  if (pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
        },
      },
    });
  }

  return pino({ name, level });
}
