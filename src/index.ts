/**
 * splitplan
 *
 * Resumable workflow state and task-list reconciliation for project-splitting
 * sessions.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './config/index.js';
export * from './session/index.js';
export * from './tasks/index.js';
export * from './manifest/index.js';
export * from './naming/index.js';

export { Logger, logger, type LogLevel, type LogEntry, type LoggerOptions } from './utils/logger.js';
export { atomicWrite } from './utils/atomic-write.js';
