/**
 * @tokenguard/types
 *
 * Shared enums and zod schemas for token requests, token views and the
 * remote tokenization authority wire format.
 */

export * from './token-kinds.js';
export * from './token.schema.js';
export * from './remote.schema.js';
