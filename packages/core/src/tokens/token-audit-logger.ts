import { logger as defaultLogger, type Logger } from '@tokenguard/observability';
import type { TokenEvent, TokenEventEmitter } from './token-events.js';

/**
 * Initialize audit logging for token lifecycle events
 * Token values in the entries are masked by the logger's stream hook
 */
export function initializeTokenAuditLogging(
  events: TokenEventEmitter,
  logger: Logger = defaultLogger
): void {
  const auditLogger = logger.child({ component: 'token-audit' });
  events.on((event) => handleTokenEvent(event, auditLogger));
  auditLogger.info('Audit logging initialized for token events');
}

export function handleTokenEvent(event: TokenEvent, logger: Logger): void {
  const logEntry = {
    event: event.type,
    timestamp: event.timestamp.toISOString(),
    metadata: event.metadata,
  };

  switch (event.type) {
    case 'token.generated':
      logger.info(logEntry, 'Token generated');
      break;

    case 'token.rotated':
      logger.info(logEntry, 'Token rotated');
      break;

    case 'token.revoked':
      logger.info(logEntry, 'Token revoked');
      break;

    case 'token.resolved':
      logger.debug(logEntry, 'Token resolved');
      break;

    case 'token.resolution_failed':
      logger.warn(logEntry, 'Token resolution failed');
      break;

    case 'tokens.expired':
      logger.info(logEntry, 'Expired tokens swept');
      break;

    case 'tokens.cleaned_up':
      logger.info(logEntry, 'Old tokens cleaned up');
      break;

    case 'authority.fallback':
      logger.warn(logEntry, 'Remote authority unavailable, served locally');
      break;
  }
}
