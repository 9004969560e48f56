import { Logger } from '@nestjs/common';
import { PipelineStage, StageResult, WebhookContext } from '../types';
import { SignatureVerifier } from '../../verification';

/**
 * Stage 1: Signature Verification
 * Authenticates the delivery and decodes it into a VerifiedEvent
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';
  private readonly logger = new Logger(VerificationStage.name);

  constructor(
    private readonly verifier: SignatureVerifier,
    private readonly signatureHeader: string,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const startTime = Date.now();
    const result = this.verifier.verify(
      context.rawBody,
      context.headers[this.signatureHeader],
    );

    if (!result.verified) {
      context.verificationError = result.error;
      this.logger.warn(
        `Rejected delivery ${context.processingId} from ${context.source}: ${result.error.reason} (${result.error.message})`,
      );

      return {
        success: true, // Classified; the acknowledger turns this into a Reject
        context,
        shouldContinue: false,
        metadata: {
          reason: result.error.reason,
          durationMs: Date.now() - startTime,
        },
      };
    }

    context.event = result.event;

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        eventId: result.event.id,
        eventType: result.event.type,
        durationMs: Date.now() - startTime,
      },
    };
  }
}
