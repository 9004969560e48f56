import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import type { Clock, ProcessingStore } from '../../../core';
import type { HookwardenModuleConfig } from '../hookwarden.config';
import { defaultHookwardenConfig } from '../hookwarden.config';
import { CLOCK, HOOKWARDEN_CONFIG, PROCESSING_STORE } from '../constants';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Retention Processor
 *
 * Purges processing records older than the retention window, on a timer
 * when `retention.autoCleanup` is set
 */
@Injectable()
export class RetentionProcessor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RetentionProcessor.name);
  private intervalId?: NodeJS.Timeout;
  private isPurging = false;

  constructor(
    @Inject(PROCESSING_STORE)
    private readonly processingStore: ProcessingStore,
    @Inject(HOOKWARDEN_CONFIG)
    private readonly config: HookwardenModuleConfig,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  onModuleInit() {
    if (this.config.retention?.autoCleanup) {
      this.startPurging();
    }
  }

  onModuleDestroy() {
    this.stopPurging();
  }

  /**
   * Start the purge timer
   */
  startPurging(): void {
    const intervalMs =
      this.config.retention?.cleanupIntervalMs ??
      defaultHookwardenConfig.retention.cleanupIntervalMs;

    this.logger.log(
      `Starting retention processor (interval: ${intervalMs}ms, retention: ${this.retentionDays} days)`,
    );

    this.intervalId = setInterval(() => {
      void this.purgeExpired();
    }, intervalMs);
  }

  stopPurging(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.log('Stopped retention processor');
    }
  }

  /**
   * Delete records first seen before the retention cutoff.
   * Returns the number removed; 0 when a purge is already running or fails.
   */
  async purgeExpired(): Promise<number> {
    if (this.isPurging) {
      return 0;
    }

    this.isPurging = true;

    try {
      const cutoff = new Date(this.clock.now().getTime() - this.retentionDays * DAY_MS);
      const removed = await this.processingStore.purgeOlderThan(cutoff);

      if (removed > 0) {
        this.logger.log(
          `Purged ${removed} processing record(s) first seen before ${cutoff.toISOString()}`,
        );
      }
      return removed;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Error purging processing records: ${err.message}`, err.stack);
      return 0;
    } finally {
      this.isPurging = false;
    }
  }

  get retentionDays(): number {
    return (
      this.config.retention?.retentionDays ??
      defaultHookwardenConfig.retention.retentionDays
    );
  }
}
