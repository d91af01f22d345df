import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MessageListResponseDto } from '../../dto/list-messages.dto';
import { ErrorDetailDto } from '../../dto/webhook-response.dto';

/**
 * Swagger decorator for listing messages
 */
export const ApiListMessages = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List messages',
      description:
        'Messages ordered by ts, then message_id. Filters combine with AND; total counts every match, not only the page.',
    }),
    ApiResponse({
      status: 200,
      description: 'Page of messages',
      type: MessageListResponseDto,
    }),
    ApiResponse({
      status: 422,
      description: 'Invalid query parameters',
      type: ErrorDetailDto,
    }),
  );
};

/**
 * Swagger decorator for aggregate statistics
 */
export const ApiMessageStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Message statistics',
      description: 'Totals, top senders and the ts range of stored messages',
    }),
    ApiResponse({
      status: 200,
      description: 'Aggregate statistics',
      schema: {
        type: 'object',
        properties: {
          total_messages: { type: 'number', example: 3 },
          senders_count: { type: 'number', example: 2 },
          messages_per_sender: {
            type: 'array',
            maxItems: 10,
            items: {
              type: 'object',
              properties: {
                from: { type: 'string', example: '+919876543210' },
                count: { type: 'number', example: 2 },
              },
            },
          },
          first_message_ts: {
            type: 'string',
            nullable: true,
            example: '2025-01-15T10:00:00Z',
          },
          last_message_ts: {
            type: 'string',
            nullable: true,
            example: '2025-01-15T12:00:00Z',
          },
        },
      },
    }),
  );
};
