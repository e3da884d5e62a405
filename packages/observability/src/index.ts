/**
 * @tokenguard/observability
 *
 * Structured logging for the tokenization engine.
 */

export { createLogger, logger, redactTokens } from './logger.js';
export type { Logger } from './logger.js';
