/**
 * Token lifecycle events for audit logging and request tracking
 * Events are fire-and-forget to avoid blocking tokenization and resolution
 */

import { logger as defaultLogger, type Logger } from '@tokenguard/observability';
import type { TokenType } from '@tokenguard/types';
import type { ValidationFailureReason } from './token-types.js';

export type ResolutionFailureReason = ValidationFailureReason | 'type_mismatch';

export interface TokenEventPayloads {
  'token.generated': {
    tokenId: number;
    tokenValue: string;
    tokenType: TokenType;
    entityId: number;
    vendorScope: string | null;
    createdBy: string | null;
  };
  'token.rotated': {
    previousTokenId: number;
    previousTokenValue: string;
    tokenId: number;
    tokenValue: string;
    tokenType: TokenType;
    entityId: number;
    rotationCount: number;
    rotatedBy: string | null;
  };
  'token.revoked': {
    tokenId: number;
    tokenValue: string;
    tokenType: TokenType;
    entityId: number;
    revokedBy: string | null;
  };
  'token.resolved': {
    tokenId: number;
    tokenValue: string;
    tokenType: TokenType;
    entityId: number;
  };
  'token.resolution_failed': {
    tokenValue: string;
    reason: ResolutionFailureReason;
  };
  'tokens.expired': {
    count: number;
    asOf: string;
  };
  'tokens.cleaned_up': {
    count: number;
    cutoff: string;
  };
  'authority.fallback': {
    operation: string;
    error: string;
  };
}

export type TokenEventType = keyof TokenEventPayloads;

export type TokenEventInput = {
  [K in TokenEventType]: { type: K; metadata: TokenEventPayloads[K] };
}[TokenEventType];

export type TokenEvent = TokenEventInput & { timestamp: Date };

export type TokenEventHandler = (event: TokenEvent) => void | Promise<void>;

/**
 * Anything that can publish token events; services depend on this,
 * tests pass `{ emit: vi.fn() }`
 */
export interface TokenEventPublisher {
  emit(event: TokenEventInput): void;
}

export class TokenEventEmitter implements TokenEventPublisher {
  private handlers: TokenEventHandler[] = [];

  constructor(private readonly logger: Logger = defaultLogger) {}

  on(handler: TokenEventHandler): void {
    this.handlers.push(handler);
  }

  emit(event: TokenEventInput): void {
    const fullEvent: TokenEvent = {
      ...event,
      timestamp: new Date(),
    };

    // Fire and forget
    void Promise.all(this.handlers.map(async (handler) => handler(fullEvent))).catch(
      (err: unknown) => {
        this.logger.error({ err, event: fullEvent.type }, 'Token event handler error');
      }
    );
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }
}
