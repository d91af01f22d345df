import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

type RawBodyRequest = Request & { rawBody?: Buffer };

/**
 * Raw Body Interceptor
 *
 * Guarantees `request.body` holds the exact bytes the sender signed. A body
 * that was already parsed into an object cannot be recovered and is
 * replaced by an empty buffer, which then fails verification.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest>();
    request.body = extractRawBody(request);
    return next.handle();
  }
}

export function extractRawBody(request: {
  rawBody?: Buffer;
  body?: unknown;
}): Buffer {
  if (Buffer.isBuffer(request.rawBody)) {
    return request.rawBody;
  }
  const body = request.body;
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf8');
  }
  return Buffer.alloc(0);
}
