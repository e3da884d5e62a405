/**
 * @tokenguard/core - Tokenization and resolution engine
 *
 * Swaps student, teacher and course identifiers for opaque vendor tokens
 * and maps tokens coming back from vendors to the real entity IDs.
 */

export * from './config.js';
export * from './tokens/index.js';
export * from './authority/index.js';
export * from './maintenance/index.js';
export { createTokenizationRuntime } from './runtime.js';
export type { TokenizationRuntime, TokenizationRuntimeOptions } from './runtime.js';
