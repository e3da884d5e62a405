/**
 * Tokens Domain
 *
 * Public exports for tokenization and resolution
 */

// Codec
export { TokenCodec, prefixFor, tokenTypeFromPrefix, generateSalt } from './token-codec.js';
export type { TokenCodecOptions, ParsedToken } from './token-codec.js';

// Repository layer
export { TokenRepository } from './token-repository.js';
export type { CreateTokenData, CreateActiveResult, TokenStore } from './token-repository.js';

// Service layer
export {
  TokenLifecycleService,
  computeSchoolYear,
  MAX_GENERATION_ATTEMPTS,
} from './token-lifecycle-service.js';
export type { LifecycleSettings } from './token-lifecycle-service.js';
export { TokenResolutionService } from './token-resolution-service.js';

// Events
export { TokenEventEmitter } from './token-events.js';
export type {
  TokenEvent,
  TokenEventInput,
  TokenEventType,
  TokenEventHandler,
  TokenEventPayloads,
  TokenEventPublisher,
  ResolutionFailureReason,
} from './token-events.js';
export { initializeTokenAuditLogging, handleTokenEvent } from './token-audit-logger.js';

// Domain types
export { entityTypeFor, mapToTokenView, parseRequest } from './token-types.js';
export type {
  GenerateTokenParams,
  GenerateTokensBulkParams,
  ValidationResult,
  ValidationFailureReason,
  UsageStatistics,
  TokenStatistics,
  RotationResult,
} from './token-types.js';

// Domain errors
export {
  TokenError,
  InvalidTokenFormatError,
  UnknownTokenTypeError,
  TokenNotFoundError,
  TokenInactiveError,
  TokenExpiredError,
  TokenTypeMismatchError,
  DuplicateTokenError,
  ActiveTokenConflictError,
  TokenGenerationExhaustedError,
  InvalidTokenStateError,
  InvalidTokenRequestError,
} from './token-errors.js';
