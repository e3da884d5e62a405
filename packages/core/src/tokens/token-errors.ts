/**
 * Token Domain Errors
 *
 * Custom error classes for token format, lookup and lifecycle violations.
 * Thrown by the codec and the service layer; callers at the HTTP edge map
 * TokenNotFoundError, TokenInactiveError and TokenExpiredError to
 * "not found" / "invalid" without exposing which one occurred.
 */

import type { TokenStatus, TokenType } from '@tokenguard/types';

export class TokenError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TokenError';
  }
}

export class InvalidTokenFormatError extends TokenError {
  constructor(reason: string) {
    super(`Invalid token format: ${reason}`);
    this.name = 'InvalidTokenFormatError';
  }
}

export class UnknownTokenTypeError extends TokenError {
  constructor(prefix: string) {
    super(`Unknown token prefix: ${prefix}`);
    this.name = 'UnknownTokenTypeError';
  }
}

export class TokenNotFoundError extends TokenError {
  constructor(tokenValue: string) {
    super(`Token not found: ${tokenValue}`);
    this.name = 'TokenNotFoundError';
  }
}

export class TokenInactiveError extends TokenError {
  constructor(
    tokenValue: string,
    public readonly status: TokenStatus
  ) {
    super(`Token is ${status.toLowerCase()}: ${tokenValue}`);
    this.name = 'TokenInactiveError';
  }
}

/**
 * The row is still ACTIVE but its expiry has passed.
 * Tells the caller that rotation, not re-authentication, is the fix.
 */
export class TokenExpiredError extends TokenError {
  constructor(
    tokenValue: string,
    public readonly expiredAt: Date
  ) {
    super(`Token has expired: ${tokenValue}`);
    this.name = 'TokenExpiredError';
  }
}

export class TokenTypeMismatchError extends TokenError {
  constructor(
    public readonly expected: TokenType,
    public readonly actual: TokenType
  ) {
    super(`Token type mismatch: expected ${expected}, got ${actual}`);
    this.name = 'TokenTypeMismatchError';
  }
}

/**
 * Store-level value collision. Retried by the lifecycle service, never
 * surfaced to its callers.
 */
export class DuplicateTokenError extends TokenError {
  constructor(tokenValue: string, options?: ErrorOptions) {
    super(`Token value already exists: ${tokenValue}`, options);
    this.name = 'DuplicateTokenError';
  }
}

/**
 * The entity already has an ACTIVE token for this scope; raised by the
 * one-active index when a plain insert would add a second one.
 */
export class ActiveTokenConflictError extends TokenError {
  constructor(
    public readonly entityType: string,
    public readonly entityId: number,
    public readonly vendorScope: string | null,
    options?: ErrorOptions
  ) {
    super(
      `Entity ${entityType} ${entityId} already has an ACTIVE token for scope ${vendorScope ?? '(universal)'}`,
      options
    );
    this.name = 'ActiveTokenConflictError';
  }
}

/**
 * Every generation attempt collided. Points at charset/hash-length
 * exhaustion or a broken store; page an operator rather than retry.
 */
export class TokenGenerationExhaustedError extends TokenError {
  constructor(
    public readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(`Failed to generate unique token after ${attempts} attempts`, options);
    this.name = 'TokenGenerationExhaustedError';
  }
}

export class InvalidTokenStateError extends TokenError {
  constructor(tokenValue: string, operation: 'rotate' | 'revoke', status: TokenStatus) {
    super(`Cannot ${operation} token ${tokenValue} with status ${status}`);
    this.name = 'InvalidTokenStateError';
  }
}

export class InvalidTokenRequestError extends TokenError {
  constructor(public readonly issues: string[]) {
    super(`Invalid token request: ${issues.join('; ')}`);
    this.name = 'InvalidTokenRequestError';
  }
}
