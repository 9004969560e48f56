import { ProcessingStatus, ReceiptKind, VerificationFailure } from '../domain/enums';
import { VerifiedEvent } from '../domain/models';
import {
  Clock,
  DeduplicationConfig,
  HandlerResult,
  LifecycleHooks,
  ProcessingMode,
  ProcessingStore,
  VerificationConfig,
} from '../interfaces';
import { DeduplicationDecision } from '../deduplication';
import { EventRouter } from '../events';
import { SignatureVerificationError } from '../verification';

/**
 * Webhook processing context passed through the pipeline
 */
export interface WebhookContext {
  // Raw input
  source: string;
  rawBody: Buffer;
  headers: Record<string, string>;
  receivedAt: Date;

  // Processing metadata
  processingId: string;

  // Verification results
  event?: VerifiedEvent;
  verificationError?: SignatureVerificationError;

  // Deduplication
  decision?: DeduplicationDecision;

  // Dispatch
  handlerResult?: HandlerResult;
  deferred?: boolean;

  // Infrastructure failure that stopped the pipeline
  error?: Error;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: WebhookContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: WebhookContext): Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  store: ProcessingStore;
  router: EventRouter;
  verification: VerificationConfig;
  deduplication?: DeduplicationConfig;
  processingMode?: ProcessingMode;
  hooks?: LifecycleHooks;
  clock?: Clock;
}

/**
 * What happened to a delivery, input to the acknowledger
 */
export type PipelineOutcome =
  | {
      kind: 'rejected';
      reason: VerificationFailure;
      error: SignatureVerificationError;
    }
  | {
      kind: 'duplicate';
      event: VerifiedEvent;
      priorStatus: ProcessingStatus;
    }
  | {
      kind: 'dispatched';
      event: VerifiedEvent;
      result: HandlerResult;
      retried: boolean;
    }
  | {
      kind: 'deferred';
      event: VerifiedEvent;
      retried: boolean;
    }
  | {
      kind: 'unavailable';
      error: Error;
      event?: VerifiedEvent;
    };

/**
 * Receipt status returned to the sender
 */
export type ReceiptDecision =
  | { kind: ReceiptKind.ACCEPT }
  | { kind: ReceiptKind.REJECT; reason: VerificationFailure }
  | { kind: ReceiptKind.RETRY; reason: string };

/**
 * Processing result returned by the pipeline
 */
export interface ProcessingResult {
  outcome: PipelineOutcome;
  receipt: ReceiptDecision;
  context: WebhookContext;
  metrics: ProcessingMetrics;
}

/**
 * Processing metrics
 */
export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Processing store could not be reached or refused an operation
 */
export class ProcessingStoreError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ProcessingStoreError';
  }
}
