import { ApiProperty } from '@nestjs/swagger';

/**
 * Body returned for an accepted webhook (created or duplicate)
 */
export class WebhookResponseDto {
  @ApiProperty({ example: 'ok' })
  status!: 'ok';
}

/**
 * Error body; `detail` is a string or a list of field violations
 */
export class ErrorDetailDto {
  @ApiProperty({
    oneOf: [
      { type: 'string', example: 'invalid signature' },
      {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            field: { type: 'string', example: 'from' },
            messages: { type: 'array', items: { type: 'string' } },
          },
        },
      },
    ],
  })
  detail!: string | Array<{ field: string; messages: string[] }>;
}
