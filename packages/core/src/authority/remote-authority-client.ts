/**
 * Remote tokenization authority client
 *
 * Thin HTTP client for a central tokenization service. Every response body
 * is checked against the wire schemas; anything unexpected (network error,
 * timeout, non-2xx, malformed body) surfaces as RemoteAuthorityError.
 * No retries: the caller falls back to the local authority instead.
 */

import { logger as defaultLogger, type Logger } from '@tokenguard/observability';
import {
  BulkResolveRequestSchema,
  RemoteBulkResolveResponseSchema,
  RemoteHealthSchema,
  RemoteResolveResponseSchema,
  RemoteTokenListSchema,
  RemoteTokenLookupSchema,
  ResolveTokenRequestSchema,
  RevokeTokenRequestSchema,
  RotateTokenRequestSchema,
  TokenViewSchema,
  type BulkTokenRequest,
  type RemoteHealth,
  type TokenRequest,
  type TokenType,
  type TokenView,
} from '@tokenguard/types';
import type { z } from 'zod';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface RemoteAuthorityClientOptions {
  baseUrl: string;
  apiKey?: string;
  /** Bound for the health probe */
  connectTimeoutMs: number;
  /** Bound for every data call */
  readTimeoutMs: number;
  fetch?: FetchFn;
  logger?: Logger;
}

export class RemoteAuthorityError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'RemoteAuthorityError';
  }
}

export class RemoteAuthorityClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: RemoteAuthorityClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.readTimeoutMs = options.readTimeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? defaultLogger).child({ module: 'remote-authority-client' });
  }

  async health(): Promise<RemoteHealth> {
    return this.request('GET', '/health', RemoteHealthSchema, { timeoutMs: this.connectTimeoutMs });
  }

  async generateToken(request: TokenRequest): Promise<TokenView> {
    return this.request('POST', '/tokens', TokenViewSchema, { body: request });
  }

  async getOrCreateToken(request: TokenRequest): Promise<TokenView> {
    return this.request('POST', '/tokens/get-or-create', TokenViewSchema, { body: request });
  }

  async generateTokensBulk(request: BulkTokenRequest): Promise<TokenView[]> {
    const list = await this.request('POST', '/tokens/bulk', RemoteTokenListSchema, {
      body: request,
    });
    return list.tokens;
  }

  async rotateToken(tokenValue: string, rotatedBy: string | null): Promise<TokenView> {
    return this.request(
      'POST',
      `/tokens/${encodeURIComponent(tokenValue)}/rotate`,
      TokenViewSchema,
      { body: RotateTokenRequestSchema.parse({ rotatedBy }) }
    );
  }

  async revokeToken(tokenValue: string, revokedBy: string | null): Promise<TokenView> {
    return this.request(
      'POST',
      `/tokens/${encodeURIComponent(tokenValue)}/revoke`,
      TokenViewSchema,
      { body: RevokeTokenRequestSchema.parse({ revokedBy }) }
    );
  }

  async resolveToEntityId(tokenValue: string, expectedType?: TokenType): Promise<number> {
    const result = await this.request('POST', '/tokens/resolve', RemoteResolveResponseSchema, {
      body: ResolveTokenRequestSchema.parse({ tokenValue, expectedType }),
    });
    return result.entityId;
  }

  async resolveTokensBulk(tokenValues: string[]): Promise<Map<string, number>> {
    const result = await this.request(
      'POST',
      '/tokens/resolve/bulk',
      RemoteBulkResolveResponseSchema,
      { body: BulkResolveRequestSchema.parse({ tokenValues }) }
    );
    return new Map(Object.entries(result.resolved));
  }

  async findTokenForEntity(
    tokenType: TokenType,
    entityId: number,
    vendorScope: string | null
  ): Promise<TokenView | null> {
    const query = vendorScope === null ? '' : `?vendorScope=${encodeURIComponent(vendorScope)}`;
    const lookup = await this.request(
      'GET',
      `/tokens/entity/${tokenType}/${entityId}${query}`,
      RemoteTokenLookupSchema
    );
    return lookup.token;
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    options: { body?: unknown; timeoutMs?: number } = {}
  ): Promise<z.output<S>> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiKey) {
      headers['X-API-Key'] = this.apiKey;
    }

    const startTime = Date.now();
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(options.timeoutMs ?? this.readTimeoutMs),
      });
    } catch (error) {
      throw new RemoteAuthorityError(`Remote authority unreachable: ${method} ${path}`, undefined, {
        cause: error,
      });
    }

    this.logger.debug(
      { method, path, status: response.status, durationMs: Date.now() - startTime },
      'Remote authority response'
    );

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new RemoteAuthorityError(
        `Remote authority error: ${response.status}${errorText ? ` - ${errorText}` : ''}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RemoteAuthorityError(`Remote authority sent invalid JSON: ${method} ${path}`, response.status, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteAuthorityError(
        `Remote authority sent an unexpected body: ${method} ${path}`,
        response.status,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }
}
