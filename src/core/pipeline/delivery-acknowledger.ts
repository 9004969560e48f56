import { HttpStatus } from '@nestjs/common';
import { ReceiptKind } from '../domain/enums';
import { PipelineOutcome, ReceiptDecision } from './types';

/**
 * Delivery Acknowledger
 *
 * Separates "did we receive it" from "did it succeed": only unverifiable
 * deliveries are rejected. Handler failures are accepted so a poison event
 * is not redelivered forever; they remain visible on the ProcessingRecord.
 */
export class DeliveryAcknowledger {
  acknowledge(outcome: PipelineOutcome): ReceiptDecision {
    switch (outcome.kind) {
      case 'rejected':
        return { kind: ReceiptKind.REJECT, reason: outcome.reason };

      case 'unavailable':
        // Nothing was claimed; a redelivery is safe
        return { kind: ReceiptKind.RETRY, reason: outcome.error.message };

      case 'duplicate':
      case 'dispatched':
      case 'deferred':
        return { kind: ReceiptKind.ACCEPT };
    }
  }

  /**
   * HTTP status for a receipt: 200 accept, 400 reject, 503 retry
   */
  toHttpStatus(receipt: ReceiptDecision): HttpStatus {
    switch (receipt.kind) {
      case ReceiptKind.ACCEPT:
        return HttpStatus.OK;
      case ReceiptKind.REJECT:
        return HttpStatus.BAD_REQUEST;
      case ReceiptKind.RETRY:
        return HttpStatus.SERVICE_UNAVAILABLE;
    }
  }
}
