import {
  Controller,
  Post,
  Body,
  Headers,
  HttpCode,
  HttpStatus,
  UseInterceptors,
  Inject,
  Logger,
  Res,
  ServiceUnavailableException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import { STORAGE_UNAVAILABLE_DETAIL } from '../filters/storage-unavailable.filter';
import type { RequestLogExtra } from '../middleware/request-logging.middleware';
import {
  IncomingHeaders,
  IngestionOutcome,
  ProcessingResult,
  StorageUnavailableError,
  WebhookProcessor,
} from '../../../core';
import { ApiWebhookEndpoint, WebhookResponseDto } from '../../../_shared';
import { WEBHOOK_PROCESSOR } from '../constants';

export const INVALID_SIGNATURE_DETAIL = 'invalid signature';

/**
 * Webhook Controller
 *
 * HTTP entry point for signed message deliveries. Created and duplicate
 * deliveries both answer 200 so the sender stops retrying.
 */
@ApiTags('Ingest')
@Controller('webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiWebhookEndpoint()
  async handleWebhook(
    @Body() rawBody: Buffer,
    @Headers() headers: IncomingHeaders,
    @Res({ passthrough: true }) res: Pick<Response, 'locals'>,
  ): Promise<WebhookResponseDto> {
    let result: ProcessingResult;
    try {
      result = await this.webhookProcessor.processWebhook(rawBody, headers);
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        this.attachLogExtra(res, { result: 'storage_unavailable' });
        throw new ServiceUnavailableException({
          detail: STORAGE_UNAVAILABLE_DETAIL,
        });
      }
      throw error;
    }

    this.attachLogExtra(res, {
      message_id: result.messageId,
      dup: result.outcome === IngestionOutcome.DUPLICATE,
      result: result.outcome,
    });

    switch (result.outcome) {
      case IngestionOutcome.INVALID_SIGNATURE:
        this.logger.error(`Rejected webhook: ${INVALID_SIGNATURE_DETAIL}`);
        throw new UnauthorizedException({ detail: INVALID_SIGNATURE_DETAIL });

      case IngestionOutcome.INVALID_PAYLOAD:
        this.logger.warn(
          `Rejected webhook: invalid payload (${(result.violations ?? [])
            .map((v) => v.field)
            .join(', ')})`,
        );
        throw new UnprocessableEntityException({
          detail: result.violations ?? [],
        });

      case IngestionOutcome.CREATED:
      case IngestionOutcome.DUPLICATE:
        this.logger.log(`Webhook ${result.outcome}: ${result.messageId}`);
        return { status: 'ok' };
    }
  }

  private attachLogExtra(res: Pick<Response, 'locals'>, extra: RequestLogExtra): void {
    res.locals.logExtra = extra;
  }
}
