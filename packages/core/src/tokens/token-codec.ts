/**
 * Token Codec
 *
 * Encodes, parses and checks token values of the form PREFIX_HASH_CHECKSUM,
 * e.g. STU_H7K2P9M3_X8:
 * - PREFIX: 3 chars identifying the token type (STU, TCH, CRS, SEC, ASN)
 * - HASH: random chars from the charset; this is where anonymity comes from
 * - CHECKSUM: rolling character sum for quick rejection of mistyped values
 *
 * The checksum is a format check, not a security boundary. Different
 * prefix/hash pairs may share a checksum.
 */

import { randomBytes, randomInt } from 'node:crypto';
import { TOKEN_PREFIXES, TOKEN_TYPES, type TokenType } from '@tokenguard/types';
import { DEFAULT_TOKEN_SETTINGS } from '../config.js';
import { InvalidTokenFormatError, UnknownTokenTypeError } from './token-errors.js';

const SEPARATOR = '_';

export interface TokenCodecOptions {
  hashCharset: string;
  hashLength: number;
  checksumLength: number;
}

export interface ParsedToken {
  prefix: string;
  hash: string;
  checksum: string;
}

const TYPE_BY_PREFIX = new Map<string, TokenType>(
  TOKEN_TYPES.map((type) => [TOKEN_PREFIXES[type], type])
);

/**
 * Prefix carried by tokens of the given type
 */
export function prefixFor(tokenType: TokenType): string {
  return TOKEN_PREFIXES[tokenType];
}

/**
 * Token type for a prefix (case-insensitive)
 *
 * @throws {UnknownTokenTypeError} If no token type uses the prefix
 */
export function tokenTypeFromPrefix(prefix: string): TokenType {
  const tokenType = TYPE_BY_PREFIX.get(prefix.toUpperCase());
  if (!tokenType) {
    throw new UnknownTokenTypeError(prefix);
  }
  return tokenType;
}

/**
 * 32 random bytes as hex; stored with the token for audit
 */
export function generateSalt(): string {
  return randomBytes(32).toString('hex');
}

export class TokenCodec {
  private readonly charset: string;
  private readonly hashLength: number;
  private readonly checksumLength: number;
  private readonly modulus: number;

  constructor(options: TokenCodecOptions = DEFAULT_TOKEN_SETTINGS) {
    this.charset = options.hashCharset;
    this.hashLength = options.hashLength;
    this.checksumLength = options.checksumLength;
    this.modulus = this.charset.length ** this.checksumLength;
  }

  /**
   * Checksum over `prefix + "_" + hash`
   *
   * Char codes are summed modulo |charset|^checksumLength and the total is
   * written as checksumLength base-|charset| digits, most significant first.
   */
  computeChecksum(prefix: string, hash: string): string {
    const input = `${prefix}${SEPARATOR}${hash}`;
    let sum = 0;
    for (let i = 0; i < input.length; i++) {
      sum = (sum + input.charCodeAt(i)) % this.modulus;
    }

    const base = this.charset.length;
    let checksum = '';
    for (let i = 0; i < this.checksumLength; i++) {
      checksum = this.charset.charAt(sum % base) + checksum;
      sum = Math.floor(sum / base);
    }
    return checksum;
  }

  /**
   * Assemble a token value from its prefix and hash
   */
  encode(prefix: string, hash: string): string {
    return [prefix, hash, this.computeChecksum(prefix, hash)].join(SEPARATOR);
  }

  /**
   * Fresh random token value for the given type
   */
  generateTokenValue(tokenType: TokenType): string {
    let hash = '';
    for (let i = 0; i < this.hashLength; i++) {
      hash += this.charset.charAt(randomInt(this.charset.length));
    }
    return this.encode(prefixFor(tokenType), hash);
  }

  /**
   * Split a token value into its segments
   *
   * The prefix is not checked against the known token types here.
   *
   * @throws {InvalidTokenFormatError} On a wrong segment count, a wrong
   *   hash or checksum length, or characters outside the charset
   */
  parse(tokenValue: string): ParsedToken {
    const parts = tokenValue.split(SEPARATOR);
    if (parts.length !== 3) {
      throw new InvalidTokenFormatError(`expected 3 segments, got ${parts.length}`);
    }

    const [prefix = '', hash = '', checksum = ''] = parts;
    if (prefix.length === 0) {
      throw new InvalidTokenFormatError('missing prefix');
    }
    if (hash.length !== this.hashLength) {
      throw new InvalidTokenFormatError(`hash must be ${this.hashLength} characters`);
    }
    if (checksum.length !== this.checksumLength) {
      throw new InvalidTokenFormatError(`checksum must be ${this.checksumLength} characters`);
    }
    if (!this.inCharset(hash) || !this.inCharset(checksum)) {
      throw new InvalidTokenFormatError('unexpected characters');
    }

    return { prefix, hash, checksum };
  }

  /**
   * Whether the value parses and its checksum segment matches
   */
  isValidChecksum(tokenValue: string): boolean {
    let parsed: ParsedToken;
    try {
      parsed = this.parse(tokenValue);
    } catch (error) {
      if (error instanceof InvalidTokenFormatError) {
        return false;
      }
      throw error;
    }

    const expected = this.computeChecksum(parsed.prefix, parsed.hash);
    return parsed.checksum.toUpperCase() === expected.toUpperCase();
  }

  /**
   * Full offline check: format, known prefix, checksum
   *
   * @returns The token type named by the prefix
   * @throws {InvalidTokenFormatError} On a malformed value or checksum mismatch
   * @throws {UnknownTokenTypeError} On an unrecognized prefix
   */
  validate(tokenValue: string): TokenType {
    const parsed = this.parse(tokenValue);
    const tokenType = tokenTypeFromPrefix(parsed.prefix);
    if (!this.isValidChecksum(tokenValue)) {
      throw new InvalidTokenFormatError('checksum mismatch');
    }
    return tokenType;
  }

  /**
   * Token type of a well-formed value, without a store lookup
   */
  extractTokenType(tokenValue: string): TokenType | null {
    try {
      return this.validate(tokenValue);
    } catch (error) {
      if (error instanceof InvalidTokenFormatError || error instanceof UnknownTokenTypeError) {
        return null;
      }
      throw error;
    }
  }

  private inCharset(segment: string): boolean {
    for (const char of segment) {
      if (!this.charset.includes(char)) {
        return false;
      }
    }
    return true;
  }
}
