import { PipelineStage, ProcessingStoreError, StageResult, WebhookContext } from '../types';
import { EventDeduplicator } from '../../deduplication';

/**
 * Stage 2: Deduplication
 * Claims the event identifier; only a fresh claim continues to dispatch
 */
export class DeduplicationStage implements PipelineStage {
  name = 'deduplication';

  constructor(private readonly deduplicator: EventDeduplicator) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const startTime = Date.now();
    const event = context.event;

    if (!event) {
      return {
        success: false,
        context,
        error: new Error('Deduplication reached without a verified event'),
        shouldContinue: false,
      };
    }

    try {
      const decision = await this.deduplicator.shouldProcess(event.id, event.type);
      context.decision = decision;

      return {
        success: true,
        context,
        shouldContinue: decision.fresh,
        metadata: {
          fresh: decision.fresh,
          durationMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      // Nothing was claimed, so the sender may safely redeliver
      const cause = error instanceof Error ? error : new Error(String(error));
      return {
        success: false,
        context,
        error: new ProcessingStoreError(
          `Could not claim event ${event.id}: ${cause.message}`,
          'claim',
          cause,
        ),
        shouldContinue: false,
        metadata: {
          durationMs: Date.now() - startTime,
        },
      };
    }
  }
}
