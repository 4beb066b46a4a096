export { logger, isLogLevel } from './logger.js';
export type { LogLevel } from './logger.js';
