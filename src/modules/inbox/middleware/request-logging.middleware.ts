import { Injectable, Logger, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { MetricsService } from '../services/metrics.service';

/**
 * Fields a handler can attach to `res.locals.logExtra` for the access log
 */
export interface RequestLogExtra {
  message_id?: string;
  dup?: boolean;
  result?: string;
}

/**
 * One structured access line and one metrics sample per request
 */
@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  constructor(private readonly metrics: MetricsService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const requestId = uuidv4();
    const startTime = process.hrtime.bigint();
    res.locals.requestId = requestId;

    res.on('finish', () => {
      const latencyMs =
        Number(process.hrtime.bigint() - startTime) / 1_000_000;
      const path = req.originalUrl.split('?')[0];

      this.metrics.recordRequest(path, res.statusCode, latencyMs);

      this.logger.log({
        request_id: requestId,
        method: req.method,
        path,
        status: res.statusCode,
        latency_ms: Math.round(latencyMs * 100) / 100,
        ...readLogExtra(res.locals.logExtra),
      });
    });

    next();
  }
}

function readLogExtra(value: unknown): RequestLogExtra {
  if (typeof value !== 'object' || value === null) {
    return {};
  }
  const extra: RequestLogExtra = {};
  if ('message_id' in value && typeof value.message_id === 'string') {
    extra.message_id = value.message_id;
  }
  if ('dup' in value && typeof value.dup === 'boolean') {
    extra.dup = value.dup;
  }
  if ('result' in value && typeof value.result === 'string') {
    extra.result = value.result;
  }
  return extra;
}
