// Logger
export { logger, Logger, isLogLevel, LOG_LEVELS } from './logger';
export type { LogLevel, TextSink } from './logger';

// Errors
export * from './errors';

// Environment helpers
export * from './env';
