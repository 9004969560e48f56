import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam, ApiBody, ApiHeader } from '@nestjs/swagger';
import { DEFAULT_SIGNATURE_HEADER } from '../../../core';
import { ProcessingRecordDto, WebhookReceiptDto } from '../../dto';

/**
 * Swagger decorator for webhook endpoints
 */
export const ApiWebhookEndpoint = (withSource: boolean) => {
  const decorators: MethodDecorator[] = [
    ApiOperation({
      summary: 'Receive a signed webhook delivery',
      description:
        'Verifies the signature and timestamp, claims the event id, runs the routed handler at most once. ' +
        'Handler failures are still acknowledged with 200; they are recorded on the processing record.',
    }),
    ApiHeader({
      name: DEFAULT_SIGNATURE_HEADER,
      description:
        'Signature header (name configurable): t=<unix seconds>,v1=<hex HMAC-SHA256 of "{t}.{body}">, one v1 per active secret',
      required: true,
      example: 't=1700000000,v1=5257a869e7ecebeda32affa62cdca3fa51cad7e77a0e56ff536d0ce8e108d8bd',
    }),
    ApiBody({
      description: 'Raw JSON payload; must carry string `id` and `type`',
      required: true,
      schema: {
        type: 'object',
        required: ['id', 'type'],
        additionalProperties: true,
        example: {
          id: 'evt_1001',
          type: 'invoice.paid',
          created: 1700000000,
          data: { invoice: 'inv_42', amount: 1500 },
        },
      },
    }),
    ApiResponse({
      status: 200,
      description: 'Accepted: handled, duplicate or deferred',
      type: WebhookReceiptDto,
    }),
    ApiResponse({
      status: 400,
      description:
        'Rejected: malformed_signature, signature_mismatch, stale_timestamp or malformed_payload',
      type: WebhookReceiptDto,
    }),
    ApiResponse({
      status: 415,
      description: 'Rejected: body_unavailable (send application/json)',
      type: WebhookReceiptDto,
    }),
    ApiResponse({
      status: 503,
      description: 'Processing store unavailable; redeliver later',
      type: WebhookReceiptDto,
    }),
  ];

  if (withSource) {
    decorators.push(
      ApiParam({
        name: 'source',
        description: 'Label for the sending system, used in logs and hooks',
        example: 'billing',
        required: true,
      }),
    );
  }

  return applyDecorators(...decorators);
};

/**
 * Swagger decorator for processing record lookup
 */
export const ApiProcessingRecord = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get the processing record for an event id',
    }),
    ApiParam({
      name: 'eventId',
      description: 'Event identifier from the payload',
      example: 'evt_1001',
    }),
    ApiResponse({
      status: 200,
      description: 'Processing record',
      type: ProcessingRecordDto,
    }),
    ApiResponse({
      status: 404,
      description: 'Event id never seen, or purged',
    }),
  );
};
