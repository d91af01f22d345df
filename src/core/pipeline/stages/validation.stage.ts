import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import {
  PipelineStage,
  WebhookContext,
  StageResult,
  FieldViolation,
} from '../types';
import { IngestionOutcome } from '../../domain/enums';
import { WebhookMessageDto } from '../../../_shared/dto/webhook-message.dto';

/**
 * Stage 2: Payload Validation
 * Parses the verified body as JSON and validates every field
 */
export class ValidationStage implements PipelineStage {
  name = 'validation';

  async execute(context: WebhookContext): Promise<StageResult> {
    const parsed = this.parseBody(context.rawBody);
    const violations = Array.isArray(parsed)
      ? parsed
      : await this.validatePayload(parsed);

    if (violations.length > 0) {
      context.violations = violations;
      context.outcome = IngestionOutcome.INVALID_PAYLOAD;

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { violatedFields: violations.map((v) => v.field) },
      };
    }

    context.payload = plainToInstance(WebhookMessageDto, parsed);

    return {
      success: true,
      context,
      shouldContinue: true,
    };
  }

  /**
   * Parse the raw body into a JSON object, or return the body violation
   */
  private parseBody(rawBody: Buffer): Record<string, unknown> | FieldViolation[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody.toString('utf8'));
    } catch {
      return [{ field: 'body', messages: ['body must be valid JSON'] }];
    }

    if (!isJsonObject(parsed)) {
      return [{ field: 'body', messages: ['body must be a JSON object'] }];
    }

    return parsed;
  }

  private async validatePayload(
    payload: Record<string, unknown>,
  ): Promise<FieldViolation[]> {
    const dto = plainToInstance(WebhookMessageDto, payload);
    const errors = await validate(dto);
    return errors.map(toFieldViolation);
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toFieldViolation(
  error: Pick<ValidationError, 'property' | 'constraints'>,
): FieldViolation {
  return {
    field: error.property,
    messages: Object.values(error.constraints ?? {}),
  };
}
