import type pino from 'pino';
import type { LogFormat, LogLevel } from '@riskweave/config';
import type { LogFn } from '@riskweave/core';

/**
 * pino options for the fastify logger
 */
export function loggerOptions(level: LogLevel = 'info', format: LogFormat = 'pretty'): pino.LoggerOptions {
  return {
    level,
    ...(format === 'pretty' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };
}

/**
 * Bind a core `onLog` callback to a pino logger
 */
export function toLogFn(logger: pino.BaseLogger): LogFn {
  return (message, level, context) => {
    logger[level](context ?? {}, message);
  };
}
