import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type {
  EventHandler,
  EventHandlerRegistration,
  EventRouter,
  EventSubscription,
  PipelineStatistics,
  ProcessingRecord,
  ProcessingResult,
  ProcessingStatus,
  ProcessingStore,
  WebhookProcessor,
} from '../../../core';
import { EVENT_ROUTER, PROCESSING_STORE, WEBHOOK_PROCESSOR } from '../constants';

/**
 * HookwardenService
 *
 * Application-facing entry point: handler registration, delivery
 * processing and record inspection
 */
@Injectable()
export class HookwardenService implements OnModuleDestroy {
  private readonly logger = new Logger(HookwardenService.name);

  constructor(
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
    @Inject(PROCESSING_STORE)
    private readonly processingStore: ProcessingStore,
    @Inject(EVENT_ROUTER)
    private readonly eventRouter: EventRouter,
  ) {}

  /**
   * Route event types matching `pattern` to `handler`
   */
  on(pattern: string, handler: EventHandler, name?: string): EventSubscription {
    return this.eventRouter.on(pattern, handler, name);
  }

  off(name: string): void {
    this.eventRouter.off(name);
  }

  getHandlers(): EventHandlerRegistration[] {
    return this.eventRouter.getHandlers();
  }

  /**
   * Process an incoming delivery
   */
  async processWebhook(
    rawBody: Buffer,
    headers: Record<string, string | string[] | undefined>,
    source?: string,
  ): Promise<ProcessingResult> {
    return this.webhookProcessor.processWebhook(rawBody, headers, source);
  }

  httpStatusFor(result: ProcessingResult): number {
    return this.webhookProcessor.httpStatusFor(result);
  }

  async getRecord(eventId: string): Promise<ProcessingRecord | null> {
    return this.processingStore.find(eventId);
  }

  async countByStatus(): Promise<Record<ProcessingStatus, number>> {
    return this.processingStore.countByStatus();
  }

  async isHealthy(): Promise<boolean> {
    return this.processingStore.isHealthy();
  }

  getPipelineStatistics(): PipelineStatistics {
    return this.webhookProcessor.getStatistics();
  }

  /**
   * Wait for deferred handlers still running
   */
  async drain(): Promise<void> {
    await this.webhookProcessor.drain();
  }

  async onModuleDestroy(): Promise<void> {
    const inFlight = this.webhookProcessor.getStatistics().inFlight;
    if (inFlight > 0) {
      this.logger.log(`Waiting for ${inFlight} deferred handler(s) to finish`);
    }
    await this.drain();
  }
}
