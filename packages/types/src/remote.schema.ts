/**
 * Remote tokenization authority response schemas
 * Every body returned by the remote is parsed with one of these before use;
 * a body that does not match is treated like any other remote failure.
 */

import { z } from 'zod';
import { TokenViewSchema } from './token.schema.js';

export const RemoteHealthSchema = z.object({
  status: z.string(),
  version: z.string().optional(),
});

export const RemoteTokenListSchema = z.object({
  tokens: z.array(TokenViewSchema),
});

export const RemoteTokenLookupSchema = z.object({
  token: TokenViewSchema.nullable(),
});

export const RemoteResolveResponseSchema = z.object({
  entityId: z.number().int().positive(),
});

export const RemoteBulkResolveResponseSchema = z.object({
  resolved: z.record(z.string(), z.number().int().positive()),
});

export type RemoteHealth = z.infer<typeof RemoteHealthSchema>;
export type RemoteTokenList = z.infer<typeof RemoteTokenListSchema>;
export type RemoteTokenLookup = z.infer<typeof RemoteTokenLookupSchema>;
export type RemoteResolveResponse = z.infer<typeof RemoteResolveResponseSchema>;
export type RemoteBulkResolveResponse = z.infer<typeof RemoteBulkResolveResponseSchema>;
