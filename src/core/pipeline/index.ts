/**
 * Webhook ingestion pipeline
 *
 * 1. Verification - authenticate the delivery
 * 2. Deduplication - claim the event identifier
 * 3. Dispatch - run the routed handler, record the result
 * then the acknowledger maps the outcome to a receipt
 */

// Main processor
export { WebhookProcessor, DEFAULT_SOURCE } from './webhook-processor';
export type { PipelineStatistics } from './webhook-processor';
export { DeliveryAcknowledger } from './delivery-acknowledger';
export { BackgroundTasks } from './background-tasks';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { VerificationStage } from './stages/verification.stage';
export { DeduplicationStage } from './stages/deduplication.stage';
export { DispatchStage } from './stages/dispatch.stage';
