export { logger, loggerOptions, REDACTED_PATHS, type Logger } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
export { loadConfig, DEFAULT_POLL_INTERVAL_MS, type ProcrunConfig } from './config.js';
