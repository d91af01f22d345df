import {
  HttpStatus,
  UnprocessableEntityException,
  ValidationPipe,
} from '@nestjs/common';
import { toFieldViolation } from '../../../core';

/**
 * ValidationPipe for query DTOs: coerces types and answers 422 with
 * `{ detail: [{ field, messages }] }`
 */
export function createQueryValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
    exceptionFactory: (errors) =>
      new UnprocessableEntityException({
        detail: errors.map(toFieldViolation),
      }),
  });
}
