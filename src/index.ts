export * from './config/index.js';
export * from './gitlab/index.js';
export * from './plugin/index.js';
export * from './tables/index.js';
export { createLogger, resolveLogLevel, LOG_LEVEL_ENV } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';
