import { ProcessingStatus, VerificationFailure } from '../domain/enums';
import { HandlerResult } from './event-handler.interface';

/**
 * Signature verification configuration
 */
export interface VerificationConfig {
  /**
   * Signing secrets. Several may be active at once during rotation;
   * a digest matching any of them is accepted.
   */
  secrets: Array<string | Buffer>;

  /**
   * Maximum distance between the signed timestamp and now (seconds).
   * Default: 300
   */
  toleranceSeconds?: number;

  /**
   * Header carrying `t=<unix>,v1=<hex>[,v1=<hex>...]`.
   * Default: `webhook-signature`
   */
  signatureHeader?: string;
}

/**
 * Deduplication configuration
 */
export interface DeduplicationConfig {
  /**
   * Age after which a pending record is considered abandoned (seconds).
   * Default: 60
   */
  staleProcessingSeconds?: number;
}

/**
 * Data retention configuration
 */
export interface RetentionConfig {
  /**
   * Processing records older than this are purged (days).
   * Must far exceed the sender's redelivery window. Default: 30
   */
  retentionDays?: number;

  /**
   * Whether the retention processor runs on a timer
   */
  autoCleanup?: boolean;

  /**
   * Interval between purges (ms). Default: 1 hour
   */
  cleanupIntervalMs?: number;
}

/**
 * `inline` runs the handler before acknowledging.
 * `deferred` records the claim, acknowledges, then runs the handler.
 */
export type ProcessingMode = 'inline' | 'deferred';

/**
 * Lifecycle hooks for monitoring and metrics
 */
export interface LifecycleHooks {
  /**
   * Called when a delivery is rejected by the verifier
   */
  onVerificationFailed?: (event: VerificationFailedEvent) => void | Promise<void>;

  /**
   * Called when a verified event was already claimed
   */
  onDuplicate?: (event: DuplicateEvent) => void | Promise<void>;

  /**
   * Called after a handler ran and its result was recorded
   */
  onHandled?: (event: HandledEvent) => void | Promise<void>;

  /**
   * Called when the pipeline hits an infrastructure error
   */
  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}

export interface VerificationFailedEvent {
  reason: VerificationFailure;
  source: string;
  receivedAt: Date;
}

export interface DuplicateEvent {
  eventId: string;
  eventType: string;
  priorStatus: ProcessingStatus;
  attempts: number;
}

export interface HandledEvent {
  eventId: string;
  eventType: string;
  result: HandlerResult;
  retried: boolean;
  deferred: boolean;
}

export interface ErrorContext {
  operation: string;
  source: string;
  eventId?: string;
}
