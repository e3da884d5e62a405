/**
 * Tokenization configuration
 *
 * Reads the engine's settings from the environment and validates them with zod.
 * Every setting has a default except the remote authority URL, which is
 * required once remote delegation is enabled.
 */

import { z } from 'zod';

export const DEFAULT_HASH_CHARSET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid tokenization configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const TokenSettingsSchema = z.object({
  hashCharset: z
    .string()
    .min(2, 'Charset needs at least two characters')
    .refine((charset) => !charset.includes('_'), 'Charset must not contain the "_" separator')
    .refine((charset) => new Set(charset).size === charset.length, 'Charset must not repeat characters'),
  hashLength: z.coerce.number().int().min(4).max(32),
  checksumLength: z.coerce.number().int().min(1).max(4),
  expirationDays: z.coerce.number().int().min(1).max(3650),
  rotationMonth: z.coerce.number().int().min(1).max(12),
});

const MaintenanceSettingsSchema = z.object({
  retentionDays: z.coerce.number().int().min(1),
  sweepIntervalMs: z.coerce.number().int().min(1000),
});

const RemoteAuthoritySettingsSchema = z
  .object({
    enabled: booleanFromEnv,
    baseUrl: z.string().url().optional(),
    apiKey: z.string().min(1).optional(),
    connectTimeoutMs: z.coerce.number().int().positive(),
    readTimeoutMs: z.coerce.number().int().positive(),
  })
  .refine((remote) => !remote.enabled || remote.baseUrl !== undefined, {
    message: 'REMOTE_AUTHORITY_URL is required when remote delegation is enabled',
    path: ['baseUrl'],
  });

const TokenizationConfigSchema = z.object({
  token: TokenSettingsSchema,
  maintenance: MaintenanceSettingsSchema,
  remote: RemoteAuthoritySettingsSchema,
  databaseUrl: z.string().min(1),
});

export type TokenSettings = z.infer<typeof TokenSettingsSchema>;
export type MaintenanceSettings = z.infer<typeof MaintenanceSettingsSchema>;
export type RemoteAuthoritySettings = z.infer<typeof RemoteAuthoritySettingsSchema>;
export type TokenizationConfig = z.infer<typeof TokenizationConfigSchema>;

export const DEFAULT_TOKEN_SETTINGS: TokenSettings = {
  hashCharset: DEFAULT_HASH_CHARSET,
  hashLength: 8,
  checksumLength: 2,
  expirationDays: 365,
  rotationMonth: 8,
};

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function loadTokenizationConfig(env: NodeJS.ProcessEnv = process.env): TokenizationConfig {
  const raw = {
    token: {
      hashCharset: blankToUndefined(env.TOKEN_HASH_CHARSET) ?? DEFAULT_TOKEN_SETTINGS.hashCharset,
      hashLength: blankToUndefined(env.TOKEN_HASH_LENGTH) ?? DEFAULT_TOKEN_SETTINGS.hashLength,
      checksumLength:
        blankToUndefined(env.TOKEN_CHECKSUM_LENGTH) ?? DEFAULT_TOKEN_SETTINGS.checksumLength,
      expirationDays:
        blankToUndefined(env.TOKEN_EXPIRATION_DAYS) ?? DEFAULT_TOKEN_SETTINGS.expirationDays,
      rotationMonth:
        blankToUndefined(env.TOKEN_ROTATION_MONTH) ?? DEFAULT_TOKEN_SETTINGS.rotationMonth,
    },
    maintenance: {
      retentionDays: blankToUndefined(env.TOKEN_RETENTION_DAYS) ?? 365,
      sweepIntervalMs: blankToUndefined(env.TOKEN_SWEEP_INTERVAL_MS) ?? 60 * 60 * 1000,
    },
    remote: {
      enabled: blankToUndefined(env.REMOTE_AUTHORITY_ENABLED)?.toLowerCase() ?? 'false',
      baseUrl: blankToUndefined(env.REMOTE_AUTHORITY_URL),
      apiKey: blankToUndefined(env.REMOTE_AUTHORITY_API_KEY),
      connectTimeoutMs: blankToUndefined(env.REMOTE_AUTHORITY_CONNECT_TIMEOUT_MS) ?? 5_000,
      readTimeoutMs: blankToUndefined(env.REMOTE_AUTHORITY_READ_TIMEOUT_MS) ?? 10_000,
    },
    databaseUrl: blankToUndefined(env.DATABASE_URL) ?? 'tokens.db',
  };

  const parsed = TokenizationConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}
