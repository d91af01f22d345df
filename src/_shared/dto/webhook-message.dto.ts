import {
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * E.164: '+' then up to 15 digits, no leading zero
 */
export const E164_PATTERN = /^\+[1-9]\d{0,14}$/;

/**
 * ISO-8601 UTC instant to the second, e.g. 2025-01-15T10:00:00Z.
 * A fixed width keeps lexical and chronological order identical.
 */
export const UTC_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export const MAX_TEXT_LENGTH = 4096;

/**
 * Inbound webhook message body
 */
export class WebhookMessageDto {
  @ApiProperty({
    description: 'Unique message identifier; repeats are treated as duplicates',
    example: 'm1',
  })
  @IsString()
  @IsNotEmpty()
  message_id!: string;

  @ApiProperty({
    description: 'Sender phone number in E.164 format',
    example: '+919876543210',
  })
  @IsString()
  @Matches(E164_PATTERN, {
    message: 'from must be E.164 format: + followed by digits',
  })
  from!: string;

  @ApiProperty({
    description: 'Recipient phone number in E.164 format',
    example: '+14155550100',
  })
  @IsString()
  @Matches(E164_PATTERN, {
    message: 'to must be E.164 format: + followed by digits',
  })
  to!: string;

  @ApiProperty({
    description: 'Message timestamp, ISO-8601 UTC ending in Z',
    example: '2025-01-15T10:00:00Z',
  })
  @IsString()
  @Matches(UTC_TIMESTAMP_PATTERN, {
    message: 'ts must be an ISO-8601 UTC timestamp like 2025-01-15T10:00:00Z',
  })
  @IsISO8601({ strict: true }, { message: 'ts must be a valid calendar date' })
  ts!: string;

  @ApiPropertyOptional({
    description: 'Message text',
    example: 'Hello',
    maxLength: MAX_TEXT_LENGTH,
    nullable: true,
  })
  @IsOptional()
  @IsString()
  @MaxLength(MAX_TEXT_LENGTH)
  text?: string | null;
}
