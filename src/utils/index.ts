/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 */

export {
  logger,
  configureLogger,
  createScopedLogger,
  formatObject,
  verbosityToLevel,
} from './logger';
export type { ConfigureLoggerOptions, LogLevel, LevelOption, ScopedLogger } from './logger';

export * from './errorUtils';
export * from './fileHelpers';
export * from './validation';

export * as schemas from './schemas';
export { RateLimiter } from './rateLimiter';
export type { RateLimiterStats } from './rateLimiter';
