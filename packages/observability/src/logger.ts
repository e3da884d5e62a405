import pino from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization and API key headers
 * - Remote authority API keys
 * - Token salts
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'req.headers["x-api-key"]',
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
  'authorization',
  'Authorization',
  'apiKey',
  'api_key',
  'salt',
  'secret',
  'password',
];

/**
 * Token values: three-letter prefix, hash, checksum (STU_H7K2P9M3_X8).
 * The prefix stays readable; hash and checksum are masked.
 */
const TOKEN_VALUE_PATTERN = /\b(STU|TCH|CRS|SEC|ASN)_[A-Za-z0-9]+_[A-Za-z0-9]+\b/g;

/**
 * Mask token values inside a string
 */
export function redactTokens(value: string): string {
  return value.replace(TOKEN_VALUE_PATTERN, '$1_[REDACTED]');
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Redaction of secrets (API keys, salts) by path
 * - Token values masked in every serialized line (prefix kept)
 * - Structured JSON output with ISO 8601 timestamps
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): pino.Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      streamWrite: redactTokens,
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

export type Logger = pino.Logger;

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
