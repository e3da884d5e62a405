/**
 * Periodic token maintenance
 *
 * On each tick: mark ACTIVE tokens past expiry as EXPIRED, then delete
 * ROTATED and REVOKED tokens older than the retention window.
 * Only the next run time is kept; a tick that lands while a run is still
 * in flight is skipped.
 */

import { logger as defaultLogger, type Logger } from '@tokenguard/observability';
import type { MaintenanceSettings } from '../config.js';
import type { TokenLifecycleService } from '../tokens/token-lifecycle-service.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MaintenanceRunResult {
  startedAt: Date;
  expired: number;
  cleanedUp: number;
}

type MaintenanceTarget = Pick<TokenLifecycleService, 'expireOldTokens' | 'cleanupOldTokens'>;

export class TokenMaintenanceScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<MaintenanceRunResult> | null = null;
  private nextRunAt: Date | null = null;
  private readonly logger: Logger;

  constructor(
    private lifecycle: MaintenanceTarget,
    private settings: MaintenanceSettings,
    logger: Logger = defaultLogger
  ) {
    this.logger = logger.child({ module: 'token-maintenance' });
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.tick(), this.settings.sweepIntervalMs);
    this.timer.unref();
    this.scheduleNext();
    this.logger.info(
      { intervalMs: this.settings.sweepIntervalMs, retentionDays: this.settings.retentionDays },
      'Token maintenance scheduled'
    );
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  getNextRunAt(): Date | null {
    return this.nextRunAt;
  }

  /**
   * Run one maintenance pass now
   * A call during an in-flight pass joins that pass.
   */
  runOnce(now: Date = new Date()): Promise<MaintenanceRunResult> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.sweep(now).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private tick(): void {
    this.scheduleNext();
    if (this.inFlight) {
      this.logger.debug('Previous maintenance pass still running, skipping tick');
      return;
    }

    this.runOnce().catch((err: unknown) => {
      this.logger.error({ err }, 'Token maintenance pass failed');
    });
  }

  private async sweep(now: Date): Promise<MaintenanceRunResult> {
    const expired = await this.lifecycle.expireOldTokens(now);
    const cutoff = new Date(now.getTime() - this.settings.retentionDays * DAY_MS);
    const cleanedUp = await this.lifecycle.cleanupOldTokens(cutoff);

    this.logger.debug({ expired, cleanedUp }, 'Token maintenance pass complete');
    return { startedAt: now, expired, cleanedUp };
  }

  private scheduleNext(): void {
    this.nextRunAt = new Date(Date.now() + this.settings.sweepIntervalMs);
  }
}
