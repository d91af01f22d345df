import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiBody, ApiHeader } from '@nestjs/swagger';
import { WebhookMessageDto } from '../../dto/webhook-message.dto';
import { ErrorDetailDto, WebhookResponseDto } from '../../dto/webhook-response.dto';

/**
 * Swagger decorator for the ingestion endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive a message webhook',
      description:
        'Verifies the HMAC-SHA256 signature of the raw body, validates the message and stores it once per message_id. Repeated deliveries of a stored message_id are acknowledged without a second write.',
    }),
    ApiHeader({
      name: 'X-Signature',
      description: 'Hex HMAC-SHA256 of the raw request body keyed with the shared secret',
      required: true,
      example: '5d41402abc4b2a76b9719d911017c592a2b5e6f3e0c7a1f4b5d8c3e2f1a0b9c8',
    }),
    ApiBody({ type: WebhookMessageDto }),
    ApiResponse({
      status: 200,
      description: 'Message stored, or already stored',
      type: WebhookResponseDto,
    }),
    ApiResponse({
      status: 401,
      description: 'Missing or invalid signature',
      type: ErrorDetailDto,
    }),
    ApiResponse({
      status: 422,
      description: 'Body is not a valid message',
      type: ErrorDetailDto,
    }),
    ApiResponse({
      status: 503,
      description: 'Storage unavailable; safe to retry',
      type: ErrorDetailDto,
    }),
  );
};
