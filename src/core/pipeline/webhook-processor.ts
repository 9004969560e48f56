import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  PipelineConfig,
  PipelineError,
  PipelineOutcome,
  PipelineStage,
  ProcessingMetrics,
  ProcessingResult,
  WebhookContext,
} from './types';
import { VerificationStage } from './stages/verification.stage';
import { DeduplicationStage } from './stages/deduplication.stage';
import { DispatchStage } from './stages/dispatch.stage';
import { DeliveryAcknowledger } from './delivery-acknowledger';
import { BackgroundTasks } from './background-tasks';
import { invokeHook } from './hooks';
import { Clock, ProcessingMode, systemClock } from '../interfaces';
import { EventDeduplicator } from '../deduplication';
import { EventRouter } from '../events';
import { DEFAULT_SIGNATURE_HEADER, SignatureVerifier } from '../verification';

export const DEFAULT_SOURCE = 'default';

export interface PipelineStatistics {
  stages: string[];
  configuration: {
    processingMode: ProcessingMode;
    signatureHeader: string;
    toleranceSeconds: number;
    staleProcessingMs: number;
    secretCount: number;
  };
  inFlight: number;
}

/**
 * WebhookProcessor orchestrates the ingestion pipeline
 *
 * Pipeline stages:
 * 1. Verification - authenticate and decode the delivery
 * 2. Deduplication - atomically claim the event identifier
 * 3. Dispatch - run the routed handler and record its result
 *
 * The acknowledger then maps the outcome to a receipt. Nothing thrown inside
 * a stage escapes `processWebhook`.
 */
export class WebhookProcessor {
  private readonly logger = new Logger(WebhookProcessor.name);
  private readonly stages: PipelineStage[];
  private readonly verifier: SignatureVerifier;
  private readonly deduplicator: EventDeduplicator;
  private readonly acknowledger = new DeliveryAcknowledger();
  private readonly background = new BackgroundTasks();
  private readonly signatureHeader: string;
  private readonly processingMode: ProcessingMode;
  private readonly clock: Clock;

  constructor(private readonly config: PipelineConfig) {
    this.clock = config.clock ?? systemClock;
    this.processingMode = config.processingMode ?? 'inline';
    this.signatureHeader = (
      config.verification.signatureHeader ?? DEFAULT_SIGNATURE_HEADER
    ).toLowerCase();

    this.verifier = new SignatureVerifier({
      secrets: config.verification.secrets,
      toleranceSeconds: config.verification.toleranceSeconds,
      clock: this.clock,
    });
    this.deduplicator = new EventDeduplicator(config.store, {
      staleProcessingSeconds: config.deduplication?.staleProcessingSeconds,
      clock: this.clock,
    });

    // Initialize pipeline stages
    this.stages = [
      new VerificationStage(this.verifier, this.signatureHeader),
      new DeduplicationStage(this.deduplicator),
      new DispatchStage(
        config.router,
        this.deduplicator,
        this.background,
        this.processingMode,
        config.hooks,
      ),
    ];
  }

  /**
   * Process a webhook delivery through the pipeline
   */
  async processWebhook(
    rawBody: Buffer,
    headers: Record<string, string | string[] | undefined>,
    source: string = DEFAULT_SOURCE,
  ): Promise<ProcessingResult> {
    const startTime = Date.now();

    const context: WebhookContext = {
      source,
      rawBody,
      headers: this.normalizeHeaders(headers),
      receivedAt: this.clock.now(),
      processingId: uuidv4(),
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
    };

    try {
      await this.executePipeline(context, metrics);
    } catch (error) {
      context.error = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Pipeline error for ${context.processingId}: ${context.error.message}`,
        context.error.stack,
      );
      await invokeHook(this.logger, 'onError', this.config.hooks?.onError, context.error, {
        operation: 'webhook-processing',
        source,
        eventId: context.event?.id,
      });
    }

    metrics.totalDurationMs = Date.now() - startTime;

    const outcome = this.resolveOutcome(context);
    const receipt = this.acknowledger.acknowledge(outcome);

    await this.notify(outcome, context);

    return { outcome, receipt, context, metrics };
  }

  /**
   * Wait for deferred handler work to finish
   */
  async drain(): Promise<void> {
    await this.background.drain();
  }

  /**
   * HTTP status for a processing result
   */
  httpStatusFor(result: ProcessingResult): number {
    return this.acknowledger.toHttpStatus(result.receipt);
  }

  /**
   * Execute the pipeline stages sequentially
   */
  private async executePipeline(
    context: WebhookContext,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();
      const result = await stage.execute(context);
      metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

      if (!result.success) {
        throw new PipelineError(
          `Stage '${stage.name}' failed: ${result.error?.message ?? 'unknown error'}`,
          stage.name,
          result.error,
        );
      }

      if (!result.shouldContinue) {
        break;
      }
    }
  }

  private resolveOutcome(context: WebhookContext): PipelineOutcome {
    if (context.verificationError) {
      return {
        kind: 'rejected',
        reason: context.verificationError.reason,
        error: context.verificationError,
      };
    }

    const { event, decision } = context;

    if (context.error || !event || !decision) {
      return {
        kind: 'unavailable',
        error: context.error ?? new Error('Pipeline stopped before a decision'),
        event,
      };
    }

    if (!decision.fresh) {
      return { kind: 'duplicate', event, priorStatus: decision.priorStatus };
    }

    if (context.deferred) {
      return { kind: 'deferred', event, retried: decision.retried };
    }

    if (context.handlerResult) {
      return {
        kind: 'dispatched',
        event,
        result: context.handlerResult,
        retried: decision.retried,
      };
    }

    return {
      kind: 'unavailable',
      error: new Error('Pipeline stopped before dispatch'),
      event,
    };
  }

  private async notify(outcome: PipelineOutcome, context: WebhookContext): Promise<void> {
    const hooks = this.config.hooks;

    if (outcome.kind === 'rejected') {
      await invokeHook(this.logger, 'onVerificationFailed', hooks?.onVerificationFailed, {
        reason: outcome.reason,
        source: context.source,
        receivedAt: context.receivedAt,
      });
    } else if (outcome.kind === 'duplicate' && context.decision && !context.decision.fresh) {
      this.logger.debug(
        `Duplicate delivery of ${outcome.event.id} (prior status: ${outcome.priorStatus})`,
      );
      await invokeHook(this.logger, 'onDuplicate', hooks?.onDuplicate, {
        eventId: outcome.event.id,
        eventType: outcome.event.type,
        priorStatus: outcome.priorStatus,
        attempts: context.decision.record.attempts,
      });
    }
  }

  /**
   * Normalize headers to lowercase keys; repeated headers are comma joined
   */
  private normalizeHeaders(
    headers: Record<string, string | string[] | undefined>,
  ): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (value === undefined) {
        continue;
      }
      normalized[key.toLowerCase()] = Array.isArray(value) ? value.join(',') : value;
    }
    return normalized;
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): PipelineStatistics {
    return {
      stages: this.stages.map((s) => s.name),
      configuration: {
        processingMode: this.processingMode,
        signatureHeader: this.signatureHeader,
        toleranceSeconds: this.verifier.tolerance,
        staleProcessingMs: this.deduplicator.staleThresholdMs,
        secretCount: this.verifier.secretCount,
      },
      inFlight: this.background.size,
    };
  }

  get router(): EventRouter {
    return this.config.router;
  }
}
