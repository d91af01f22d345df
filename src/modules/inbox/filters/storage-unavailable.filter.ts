import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { StorageUnavailableError } from '../../../core';

export const STORAGE_UNAVAILABLE_DETAIL = 'storage unavailable';

/**
 * Answers 503 when the message store cannot be reached
 */
@Catch(StorageUnavailableError)
export class StorageUnavailableFilter implements ExceptionFilter {
  private readonly logger = new Logger(StorageUnavailableFilter.name);

  catch(exception: StorageUnavailableError, host: ArgumentsHost): void {
    this.logger.error(`Storage unavailable: ${exception.message}`, exception.stack);

    host
      .switchToHttp()
      .getResponse<Response>()
      .status(HttpStatus.SERVICE_UNAVAILABLE)
      .json({ detail: STORAGE_UNAVAILABLE_DETAIL });
  }
}
