export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Logging callback accepted by core components. Apps bind it to their logger.
 */
export type LogFn = (message: string, level: LogLevel, context?: Record<string, unknown>) => void;
