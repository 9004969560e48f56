import {
  Controller,
  Get,
  Post,
  Param,
  Headers,
  HttpCode,
  HttpException,
  HttpStatus,
  NotFoundException,
  UseInterceptors,
  Logger,
  Req,
  RawBodyRequest,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Request } from 'express';
import type { IncomingHttpHeaders } from 'http';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import { HookwardenService } from '../services/hookwarden.service';
import { DEFAULT_SOURCE, ProcessingResult, ReceiptKind } from '../../../core';
import {
  ApiProcessingRecord,
  ApiWebhookEndpoint,
  ProcessingRecordDto,
  WebhookReceiptDto,
} from '../../../_shared';

/**
 * Webhook Controller
 *
 * Receiving endpoint for signed deliveries. Only the receipt decides the
 * status code: 200 accept, 400 reject, 503 retry.
 */
@ApiTags('Ingest')
@Controller('webhooks')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(private readonly hookwarden: HookwardenService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiWebhookEndpoint(false)
  async receive(
    @Req() request: RawBodyRequest<Request>,
    @Headers() headers: IncomingHttpHeaders,
  ): Promise<WebhookReceiptDto> {
    return this.handle(DEFAULT_SOURCE, request, headers);
  }

  @Post(':source')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiWebhookEndpoint(true)
  async receiveFromSource(
    @Param('source') source: string,
    @Req() request: RawBodyRequest<Request>,
    @Headers() headers: IncomingHttpHeaders,
  ): Promise<WebhookReceiptDto> {
    return this.handle(source.toLowerCase(), request, headers);
  }

  @Get('events/:eventId')
  @ApiProcessingRecord()
  async getEvent(@Param('eventId') eventId: string): Promise<ProcessingRecordDto> {
    const record = await this.hookwarden.getRecord(eventId);
    if (!record) {
      throw new NotFoundException(`No processing record for event ${eventId}`);
    }
    return ProcessingRecordDto.fromRecord(record);
  }

  private async handle(
    source: string,
    request: RawBodyRequest<Request>,
    headers: IncomingHttpHeaders,
  ): Promise<WebhookReceiptDto> {
    const rawBody = request.rawBody ?? Buffer.alloc(0);
    const result = await this.hookwarden.processWebhook(rawBody, headers, source);
    const response = this.formatResponse(result);

    if (result.receipt.kind !== ReceiptKind.ACCEPT) {
      this.logger.warn(
        `Delivery from ${source} answered with ${result.receipt.kind}: ${response.reason}`,
      );
      throw new HttpException(response, this.hookwarden.httpStatusFor(result));
    }

    return response;
  }

  private formatResponse(result: ProcessingResult): WebhookReceiptDto {
    const { outcome, receipt } = result;

    switch (receipt.kind) {
      case ReceiptKind.REJECT:
        return { received: false, decision: receipt.kind, reason: receipt.reason };

      case ReceiptKind.RETRY:
        // Store errors stay in the logs
        return {
          received: false,
          decision: receipt.kind,
          reason: 'temporarily_unavailable',
        };

      case ReceiptKind.ACCEPT:
        return {
          received: true,
          decision: receipt.kind,
          outcome: outcome.kind,
          eventId: outcome.kind === 'rejected' ? undefined : outcome.event?.id,
          eventType: outcome.kind === 'rejected' ? undefined : outcome.event?.type,
        };
    }
  }
}
