import pino, { type LoggerOptions } from 'pino';
import { trace } from '@opentelemetry/api';

/**
 * Job requests carry container environment variables, which often hold
 * credentials. Paths here are censored wherever a request gets logged.
 */
export const REDACTED_PATHS = ['environment', '*.environment'];

export const loggerOptions: LoggerOptions = {
  name: 'procrun',
  level: process.env.LOG_LEVEL ?? 'info',
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const ctx = span.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  },
};

export const logger = pino(loggerOptions);

export type Logger = typeof logger;
