/**
 * Token authorities
 *
 * The local authority answers from this engine's own store. The remote
 * authority delegates to a central service and falls back to the local
 * one on any remote failure, so callers always get an answer (or the
 * local typed error). A remote answer that is well-formed JSON but names
 * another entity, a bad token value or the wrong status counts as a
 * failure too. Which one runs is decided once at startup.
 */

import { logger as defaultLogger, type Logger } from '@tokenguard/observability';
import {
  BulkTokenRequestSchema,
  RevokeTokenRequestSchema,
  RotateTokenRequestSchema,
  TokenRequestSchema,
  VendorScopeSchema,
  type TokenResponse,
  type TokenStatus,
  type TokenType,
  type TokenView,
} from '@tokenguard/types';
import type { RemoteAuthoritySettings } from '../config.js';
import type { TokenCodec } from '../tokens/token-codec.js';
import type { TokenEventPublisher } from '../tokens/token-events.js';
import type { TokenLifecycleService } from '../tokens/token-lifecycle-service.js';
import type { TokenResolutionService } from '../tokens/token-resolution-service.js';
import {
  mapToTokenView,
  parseRequest,
  type GenerateTokenParams,
  type GenerateTokensBulkParams,
} from '../tokens/token-types.js';
import {
  RemoteAuthorityClient,
  RemoteAuthorityError,
  type FetchFn,
} from './remote-authority-client.js';

export interface RemoteHealthStatus {
  status: 'up' | 'down';
  checkedAt: string;
  version?: string;
  error?: string;
}

export interface AuthorityHealth {
  mode: 'local' | 'remote';
  /** Last probe of the remote; null in local mode */
  remote: RemoteHealthStatus | null;
}

interface TokenAuthorityOperations {
  generateToken(params: GenerateTokenParams): Promise<TokenResponse>;
  getOrCreateToken(params: GenerateTokenParams): Promise<TokenResponse>;
  generateTokensBulk(params: GenerateTokensBulkParams): Promise<TokenResponse[]>;
  rotateToken(tokenValue: string, rotatedBy?: string | null): Promise<TokenResponse>;
  revokeToken(tokenValue: string, revokedBy?: string | null): Promise<TokenResponse>;
  resolveToEntityId(tokenValue: string, expectedType?: TokenType): Promise<number>;
  findTokenForEntity(
    tokenType: TokenType,
    entityId: number,
    vendorScope?: string | null
  ): Promise<TokenResponse | null>;
  resolveTokensBulk(tokenValues: string[]): Promise<Map<string, number>>;
  health(): Promise<AuthorityHealth>;
}

/**
 * What a remote answer must agree with; unset fields are not checked
 */
interface ExpectedToken {
  tokenType?: TokenType;
  entityId?: number;
  vendorScope?: string | null;
  status?: TokenStatus;
  /** The answer must carry exactly this value */
  tokenValue?: string;
  /** The answer must carry any value but this one */
  replaces?: string;
}

function describeScope(scope: string | null): string {
  return scope ?? '(universal)';
}

export class LocalTokenAuthority implements TokenAuthorityOperations {
  readonly mode = 'local';

  constructor(
    private lifecycle: TokenLifecycleService,
    private resolution: TokenResolutionService
  ) {}

  async generateToken(params: GenerateTokenParams): Promise<TokenResponse> {
    return { ...mapToTokenView(await this.lifecycle.generateToken(params)), source: 'local' };
  }

  async getOrCreateToken(params: GenerateTokenParams): Promise<TokenResponse> {
    return { ...mapToTokenView(await this.lifecycle.getOrCreateToken(params)), source: 'local' };
  }

  async generateTokensBulk(params: GenerateTokensBulkParams): Promise<TokenResponse[]> {
    const tokens = await this.lifecycle.generateTokensBulk(params);
    return tokens.map((token): TokenResponse => ({ ...mapToTokenView(token), source: 'local' }));
  }

  async rotateToken(tokenValue: string, rotatedBy: string | null = null): Promise<TokenResponse> {
    const rotated = await this.lifecycle.rotateTokenByValue(tokenValue, rotatedBy);
    return { ...mapToTokenView(rotated), source: 'local' };
  }

  async revokeToken(tokenValue: string, revokedBy: string | null = null): Promise<TokenResponse> {
    const revoked = await this.lifecycle.revokeTokenByValue(tokenValue, revokedBy);
    return { ...mapToTokenView(revoked), source: 'local' };
  }

  async resolveToEntityId(tokenValue: string, expectedType?: TokenType): Promise<number> {
    return this.resolution.resolveToEntityId(tokenValue, expectedType);
  }

  async findTokenForEntity(
    tokenType: TokenType,
    entityId: number,
    vendorScope: string | null = null
  ): Promise<TokenResponse | null> {
    const token = await this.resolution.findTokenForEntity(tokenType, entityId, vendorScope);
    return token ? { ...mapToTokenView(token), source: 'local' } : null;
  }

  async resolveTokensBulk(tokenValues: string[]): Promise<Map<string, number>> {
    return this.resolution.resolveTokensBulk(tokenValues);
  }

  async health(): Promise<AuthorityHealth> {
    return { mode: 'local', remote: null };
  }
}

export class RemoteTokenAuthority implements TokenAuthorityOperations {
  readonly mode = 'remote';
  private lastHealth: RemoteHealthStatus | null = null;
  private readonly logger: Logger;

  constructor(
    private client: RemoteAuthorityClient,
    private local: LocalTokenAuthority,
    private codec: TokenCodec,
    private tokenEvents: TokenEventPublisher,
    logger: Logger = defaultLogger
  ) {
    this.logger = logger.child({ module: 'remote-token-authority' });
  }

  async generateToken(params: GenerateTokenParams): Promise<TokenResponse> {
    const request = parseRequest(TokenRequestSchema, params);
    return this.withFallback(
      'generateToken',
      async () =>
        this.accept('generateToken', await this.client.generateToken(request), {
          tokenType: request.tokenType,
          entityId: request.entityId,
          vendorScope: request.vendorScope,
          status: 'ACTIVE',
        }),
      () => this.local.generateToken(request)
    );
  }

  async getOrCreateToken(params: GenerateTokenParams): Promise<TokenResponse> {
    const request = parseRequest(TokenRequestSchema, params);
    return this.withFallback(
      'getOrCreateToken',
      async () =>
        this.accept('getOrCreateToken', await this.client.getOrCreateToken(request), {
          tokenType: request.tokenType,
          entityId: request.entityId,
          vendorScope: request.vendorScope,
          status: 'ACTIVE',
        }),
      () => this.local.getOrCreateToken(request)
    );
  }

  async generateTokensBulk(params: GenerateTokensBulkParams): Promise<TokenResponse[]> {
    const request = parseRequest(BulkTokenRequestSchema, params);
    return this.withFallback(
      'generateTokensBulk',
      async () => {
        const views = await this.client.generateTokensBulk(request);
        if (views.length !== request.entityIds.length) {
          throw new RemoteAuthorityError(
            'Remote authority sent an unexpected token for generateTokensBulk: ' +
              `expected ${request.entityIds.length} tokens, got ${views.length}`
          );
        }
        return views.map((view, index) =>
          this.accept('generateTokensBulk', view, {
            tokenType: request.tokenType,
            entityId: request.entityIds[index],
            vendorScope: request.vendorScope,
            status: 'ACTIVE',
          })
        );
      },
      () => this.local.generateTokensBulk(request)
    );
  }

  async rotateToken(tokenValue: string, rotatedBy: string | null = null): Promise<TokenResponse> {
    const request = parseRequest(RotateTokenRequestSchema, { rotatedBy });
    return this.withFallback(
      'rotateToken',
      async () =>
        this.accept('rotateToken', await this.client.rotateToken(tokenValue, request.rotatedBy), {
          tokenType: this.codec.extractTokenType(tokenValue) ?? undefined,
          status: 'ACTIVE',
          replaces: tokenValue,
        }),
      () => this.local.rotateToken(tokenValue, request.rotatedBy)
    );
  }

  async revokeToken(tokenValue: string, revokedBy: string | null = null): Promise<TokenResponse> {
    const request = parseRequest(RevokeTokenRequestSchema, { revokedBy });
    return this.withFallback(
      'revokeToken',
      async () =>
        this.accept('revokeToken', await this.client.revokeToken(tokenValue, request.revokedBy), {
          status: 'REVOKED',
          tokenValue,
        }),
      () => this.local.revokeToken(tokenValue, request.revokedBy)
    );
  }

  async resolveToEntityId(tokenValue: string, expectedType?: TokenType): Promise<number> {
    return this.withFallback(
      'resolveToEntityId',
      () => this.client.resolveToEntityId(tokenValue, expectedType),
      () => this.local.resolveToEntityId(tokenValue, expectedType)
    );
  }

  async findTokenForEntity(
    tokenType: TokenType,
    entityId: number,
    vendorScope: string | null = null
  ): Promise<TokenResponse | null> {
    const scope = parseRequest(VendorScopeSchema, vendorScope);
    return this.withFallback(
      'findTokenForEntity',
      async () => {
        const view = await this.client.findTokenForEntity(tokenType, entityId, scope);
        return view
          ? this.accept('findTokenForEntity', view, {
              tokenType,
              entityId,
              vendorScope: scope,
              status: 'ACTIVE',
            })
          : null;
      },
      () => this.local.findTokenForEntity(tokenType, entityId, scope)
    );
  }

  async resolveTokensBulk(tokenValues: string[]): Promise<Map<string, number>> {
    return this.withFallback(
      'resolveTokensBulk',
      async () => {
        const resolved = await this.client.resolveTokensBulk(tokenValues);
        const requested = new Set(tokenValues);
        for (const tokenValue of resolved.keys()) {
          if (!requested.has(tokenValue)) {
            throw new RemoteAuthorityError(
              'Remote authority sent an unexpected token for resolveTokensBulk: value was not requested'
            );
          }
        }
        return resolved;
      },
      () => this.local.resolveTokensBulk(tokenValues)
    );
  }

  /**
   * Probe the remote and remember the outcome
   * Request paths never consult this; each call tries the remote itself.
   */
  async health(): Promise<AuthorityHealth> {
    const checkedAt = new Date().toISOString();
    try {
      const remote = await this.client.health();
      this.lastHealth = { status: 'up', checkedAt, version: remote.version };
    } catch (error) {
      this.lastHealth = {
        status: 'down',
        checkedAt,
        error: error instanceof Error ? error.message : String(error),
      };
      this.logger.warn({ err: error }, 'Remote authority health check failed');
    }
    return { mode: 'remote', remote: this.lastHealth };
  }

  getLastHealth(): RemoteHealthStatus | null {
    return this.lastHealth;
  }

  /**
   * Tag a remote answer, or reject it so the call falls back to the local store
   *
   * @throws {RemoteAuthorityError} If the answer is not a well-formed token
   *   that agrees with what was asked for
   */
  private accept(operation: string, view: TokenView, expected: ExpectedToken): TokenResponse {
    const problem = this.findMismatch(view, expected);
    if (problem) {
      throw new RemoteAuthorityError(
        `Remote authority sent an unexpected token for ${operation}: ${problem}`
      );
    }
    return { ...view, source: 'remote' };
  }

  private findMismatch(view: TokenView, expected: ExpectedToken): string | null {
    const valueType = this.codec.extractTokenType(view.tokenValue);
    if (valueType === null) {
      return 'invalid token value';
    }
    if (valueType !== view.tokenType) {
      return `value prefix is ${valueType}, type is ${view.tokenType}`;
    }
    if (expected.tokenValue !== undefined && view.tokenValue !== expected.tokenValue) {
      return 'value differs from the requested token';
    }
    if (expected.replaces !== undefined && view.tokenValue === expected.replaces) {
      return 'value was not replaced';
    }
    if (expected.tokenType !== undefined && view.tokenType !== expected.tokenType) {
      return `expected type ${expected.tokenType}, got ${view.tokenType}`;
    }
    if (expected.entityId !== undefined && view.entityId !== expected.entityId) {
      return `expected entity ${expected.entityId}, got ${view.entityId}`;
    }
    if (expected.vendorScope !== undefined && view.vendorScope !== expected.vendorScope) {
      return `expected scope ${describeScope(expected.vendorScope)}, got ${describeScope(view.vendorScope)}`;
    }
    if (expected.status !== undefined && view.status !== expected.status) {
      return `expected status ${expected.status}, got ${view.status}`;
    }
    return null;
  }

  private async withFallback<T>(
    operation: string,
    remote: () => Promise<T>,
    local: () => Promise<T>
  ): Promise<T> {
    try {
      return await remote();
    } catch (error) {
      this.logger.warn({ err: error, operation }, 'Remote authority failed, falling back to local');
      this.tokenEvents.emit({
        type: 'authority.fallback',
        metadata: {
          operation,
          error: error instanceof Error ? error.message : String(error),
        },
      });
      return local();
    }
  }
}

export type TokenAuthority = LocalTokenAuthority | RemoteTokenAuthority;

export interface TokenAuthorityDependencies {
  lifecycle: TokenLifecycleService;
  resolution: TokenResolutionService;
  /** Checks remote answers; must match the format the local engine issues */
  codec: TokenCodec;
  tokenEvents: TokenEventPublisher;
  logger?: Logger;
  fetch?: FetchFn;
}

/**
 * Pick the authority for this process from configuration
 */
export function createTokenAuthority(
  settings: RemoteAuthoritySettings,
  deps: TokenAuthorityDependencies
): TokenAuthority {
  const logger = deps.logger ?? defaultLogger;
  const local = new LocalTokenAuthority(deps.lifecycle, deps.resolution);

  if (!settings.enabled || !settings.baseUrl) {
    logger.info('Token authority: local');
    return local;
  }

  const client = new RemoteAuthorityClient({
    baseUrl: settings.baseUrl,
    apiKey: settings.apiKey,
    connectTimeoutMs: settings.connectTimeoutMs,
    readTimeoutMs: settings.readTimeoutMs,
    fetch: deps.fetch,
    logger,
  });

  logger.info({ baseUrl: settings.baseUrl }, 'Token authority: remote with local fallback');
  return new RemoteTokenAuthority(client, local, deps.codec, deps.tokenEvents, logger);
}
