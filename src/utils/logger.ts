import pino from 'pino';

let correlationId: string | undefined;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function baseOptions(): pino.LoggerOptions {
  const level = process.env.LOG_LEVEL || 'info';
  if (process.env.NODE_ENV !== 'development') {
    return { level };
  }
  return {
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

let baseLogger: pino.Logger | undefined;

/**
 * Child logger bound to the process correlation id. Every component and job
 * gets its own child with its context fields attached.
 */
export function createLogger(context?: Record<string, unknown>): pino.Logger {
  baseLogger ??= pino(baseOptions());
  correlationId ??= generateCorrelationId();

  return baseLogger.child({
    correlationId,
    ...context,
  });
}
