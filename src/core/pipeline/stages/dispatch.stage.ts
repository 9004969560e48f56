import { Logger } from '@nestjs/common';
import { PipelineStage, StageResult, WebhookContext } from '../types';
import { BackgroundTasks } from '../background-tasks';
import { invokeHook } from '../hooks';
import { ProcessingStatus } from '../../domain/enums';
import { VerifiedEvent } from '../../domain/models';
import { HandlerResult, LifecycleHooks, ProcessingMode } from '../../interfaces';
import { EventDeduplicator } from '../../deduplication';
import { EventRouter } from '../../events';

/**
 * Stage 3: Dispatch
 * Runs the routed handler for a freshly claimed event and records its result.
 * In deferred mode the handler runs after the acknowledgement.
 */
export class DispatchStage implements PipelineStage {
  name = 'dispatch';
  private readonly logger = new Logger(DispatchStage.name);

  constructor(
    private readonly router: EventRouter,
    private readonly deduplicator: EventDeduplicator,
    private readonly background: BackgroundTasks,
    private readonly processingMode: ProcessingMode = 'inline',
    private readonly hooks?: LifecycleHooks,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const startTime = Date.now();
    const { event, decision } = context;

    if (!event || !decision?.fresh) {
      return {
        success: false,
        context,
        error: new Error('Dispatch reached without a claimed event'),
        shouldContinue: false,
      };
    }

    const { attempt, retried } = decision;

    if (this.processingMode === 'deferred') {
      context.deferred = true;
      this.background.run(`dispatch:${event.id}`, async () => {
        await this.handle(event, attempt, retried, true);
      });

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: {
          deferred: true,
          durationMs: Date.now() - startTime,
        },
      };
    }

    context.handlerResult = await this.handle(event, attempt, retried, false);

    return {
      success: true,
      context,
      shouldContinue: false, // Last stage
      metadata: {
        handlerName: context.handlerResult.handlerName,
        handlerSucceeded: context.handlerResult.success,
        durationMs: Date.now() - startTime,
      },
    };
  }

  /**
   * Dispatch, then move the record out of pending. Never throws.
   */
  private async handle(
    event: VerifiedEvent,
    attempt: number,
    retried: boolean,
    deferred: boolean,
  ): Promise<HandlerResult> {
    const result = await this.router.dispatch(event);

    if (!result.success) {
      this.logger.warn(
        `Event ${event.id} (${event.type}) failed in handler "${result.handlerName}": ${result.reason}`,
      );
    }

    try {
      await this.deduplicator.markResult(
        event.id,
        attempt,
        result.success ? ProcessingStatus.DONE : ProcessingStatus.FAILED,
        result.success ? undefined : result.reason,
      );
    } catch (error) {
      // The record stays pending and becomes eligible for the stale retry
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Could not record result for ${event.id}: ${err.message}`,
        err.stack,
      );
      await invokeHook(this.logger, 'onError', this.hooks?.onError, err, {
        operation: 'mark-result',
        source: 'dispatch',
        eventId: event.id,
      });
    }

    await invokeHook(this.logger, 'onHandled', this.hooks?.onHandled, {
      eventId: event.id,
      eventType: event.type,
      result,
      retried,
      deferred,
    });

    return result;
  }
}
