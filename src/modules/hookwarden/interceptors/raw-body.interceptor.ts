import {
  Injectable,
  Logger,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  HttpStatus,
  RawBodyRequest,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';
import { ReceiptKind } from '../../../core';

export const BODY_UNAVAILABLE = 'body_unavailable';

/**
 * Raw Body Interceptor
 *
 * Guarantees `request.rawBody` is a Buffer of the exact bytes received,
 * which signature verification needs. Relies on the application being
 * created with `rawBody: true`; Nest only captures the raw bytes of
 * `application/json` and `application/x-www-form-urlencoded` bodies.
 * Anything else is rejected with 415 before it reaches the verifier.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RawBodyInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();

    if (!Buffer.isBuffer(request.rawBody)) {
      const recovered = this.recoverRawBody(request.body);
      if (!recovered) {
        this.logger.warn(
          `Raw body unavailable for content type "${request.headers['content-type'] ?? 'none'}"`,
        );
        throw new HttpException(
          { received: false, decision: ReceiptKind.REJECT, reason: BODY_UNAVAILABLE },
          HttpStatus.UNSUPPORTED_MEDIA_TYPE,
        );
      }
      request.rawBody = recovered;
    }

    return next.handle();
  }

  private recoverRawBody(body: unknown): Buffer | null {
    if (Buffer.isBuffer(body)) {
      return body;
    }
    if (typeof body === 'string') {
      return Buffer.from(body);
    }

    // A parsed body cannot be turned back into the signed bytes
    return null;
  }
}
