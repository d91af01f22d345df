import {
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { E164_PATTERN, UTC_TIMESTAMP_PATTERN } from './webhook-message.dto';

/**
 * Query parameters for listing messages
 */
export class ListMessagesQueryDto {
  @ApiPropertyOptional({
    description: 'Number of results per page',
    default: 50,
    minimum: 1,
    maximum: 100,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number = 50;

  @ApiPropertyOptional({
    description: 'Number of results to skip',
    default: 0,
    minimum: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number = 0;

  @ApiPropertyOptional({
    description: 'Exact sender (E.164)',
    example: '+919876543210',
  })
  @IsOptional()
  @IsString()
  @Matches(E164_PATTERN, {
    message: 'from must be E.164 format: + followed by digits',
  })
  from?: string;

  @ApiPropertyOptional({
    description: 'Only messages with ts at or after this instant',
    example: '2025-01-15T09:30:00Z',
  })
  @IsOptional()
  @IsString()
  @Matches(UTC_TIMESTAMP_PATTERN, {
    message: 'since must be an ISO-8601 UTC timestamp like 2025-01-15T10:00:00Z',
  })
  @IsISO8601({ strict: true }, { message: 'since must be a valid calendar date' })
  since?: string;

  @ApiPropertyOptional({
    description: 'Case-insensitive substring of the message text',
    example: 'hello',
  })
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(256)
  q?: string;
}

/**
 * Message as returned by the read endpoints
 */
export class MessageResponseDto {
  @ApiPropertyOptional({ example: 'm1' })
  message_id!: string;

  @ApiPropertyOptional({ example: '+919876543210' })
  from!: string;

  @ApiPropertyOptional({ example: '+14155550100' })
  to!: string;

  @ApiPropertyOptional({ example: '2025-01-15T10:00:00Z' })
  ts!: string;

  @ApiPropertyOptional({ example: 'Hello', nullable: true, type: String })
  text!: string | null;
}

export class MessageListResponseDto {
  @ApiPropertyOptional({ type: [MessageResponseDto] })
  data!: MessageResponseDto[];

  @ApiPropertyOptional({ description: 'Rows matching the filters', example: 1 })
  total!: number;

  @ApiPropertyOptional({ example: 50 })
  limit!: number;

  @ApiPropertyOptional({ example: 0 })
  offset!: number;
}
