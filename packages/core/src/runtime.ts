/**
 * Tokenization runtime
 *
 * Wires configuration, storage, services, the authority and the
 * maintenance scheduler into one object for the host application.
 */

import { createDatabase, type DatabaseHandle } from '@tokenguard/database';
import { logger as defaultLogger, type Logger } from '@tokenguard/observability';
import { createTokenAuthority, type TokenAuthority } from './authority/token-authority.js';
import type { FetchFn } from './authority/remote-authority-client.js';
import { loadTokenizationConfig, type TokenizationConfig } from './config.js';
import { TokenMaintenanceScheduler } from './maintenance/token-maintenance-scheduler.js';
import { initializeTokenAuditLogging } from './tokens/token-audit-logger.js';
import { TokenCodec } from './tokens/token-codec.js';
import { TokenEventEmitter } from './tokens/token-events.js';
import { TokenLifecycleService } from './tokens/token-lifecycle-service.js';
import { TokenRepository } from './tokens/token-repository.js';
import { TokenResolutionService } from './tokens/token-resolution-service.js';

export interface TokenizationRuntimeOptions {
  /** Defaults to loadTokenizationConfig(process.env) */
  config?: TokenizationConfig;
  /** Defaults to a database opened at config.databaseUrl */
  database?: DatabaseHandle;
  logger?: Logger;
  fetch?: FetchFn;
  /** Start the periodic sweep (default: true) */
  startMaintenance?: boolean;
  /** Subscribe the audit logger to token events (default: true) */
  auditLogging?: boolean;
}

export interface TokenizationRuntime {
  config: TokenizationConfig;
  database: DatabaseHandle;
  codec: TokenCodec;
  repository: TokenRepository;
  events: TokenEventEmitter;
  lifecycle: TokenLifecycleService;
  resolution: TokenResolutionService;
  authority: TokenAuthority;
  maintenance: TokenMaintenanceScheduler;
  close(): void;
}

export function createTokenizationRuntime(
  options: TokenizationRuntimeOptions = {}
): TokenizationRuntime {
  const config = options.config ?? loadTokenizationConfig();
  const logger = options.logger ?? defaultLogger;
  const database = options.database ?? createDatabase({ url: config.databaseUrl });

  const events = new TokenEventEmitter(logger);
  if (options.auditLogging ?? true) {
    initializeTokenAuditLogging(events, logger);
  }

  const codec = new TokenCodec(config.token);
  const repository = new TokenRepository(database.db);
  const lifecycle = new TokenLifecycleService(repository, codec, events, config.token, logger);
  const resolution = new TokenResolutionService(repository, codec, events, logger);
  const authority = createTokenAuthority(config.remote, {
    lifecycle,
    resolution,
    codec,
    tokenEvents: events,
    logger,
    fetch: options.fetch,
  });

  const maintenance = new TokenMaintenanceScheduler(lifecycle, config.maintenance, logger);
  if (options.startMaintenance ?? true) {
    maintenance.start();
  }

  return {
    config,
    database,
    codec,
    repository,
    events,
    lifecycle,
    resolution,
    authority,
    maintenance,
    close: () => {
      maintenance.stop();
      events.clearHandlers();
      if (!options.database) {
        database.close();
      }
    },
  };
}
