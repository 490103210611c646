/**
 * agentcore-sdk
 *
 * Shared platform conventions for agent services: categorized errors, layered
 * configuration, structured logging, agent lifecycle management, execution
 * records and caller identity context.
 */

export * from './errors/index.js';
export * from './config/index.js';
export * from './lifecycle/index.js';
export * from './models/index.js';
export * from './auth/index.js';
export {
  createLogger,
  initLogger,
  getLogger,
  log,
  isLogLevel,
  LOG_LEVELS,
  LOG_LEVEL_ENV,
  type LogLevel,
  type LoggerOptions,
  type StructuredLogger,
} from './logging/logger.js';
