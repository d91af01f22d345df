import { Message } from '../domain/models';
import { InsertOutcome } from '../domain/enums';
import {
  CreateMessageDto,
  MessageFilter,
  MessageStatistics,
  OffsetPage,
  OffsetPagination,
} from './common.types';

/**
 * Number of senders reported in MessageStatistics.messagesPerSender
 */
export const TOP_SENDERS_LIMIT = 10;

/**
 * Storage adapter interface - abstracts all database operations
 *
 * Failures other than a duplicate key MUST surface as StorageUnavailableError.
 */
export interface MessageStorageAdapter {
  // ==================== Writes ====================

  /**
   * Insert a message unless one with the same messageId exists.
   *
   * MUST be decided by a uniqueness constraint enforced at write time:
   * of any number of concurrent callers with the same id, exactly one
   * gets CREATED and the others get DUPLICATE.
   */
  insertIfAbsent(dto: CreateMessageDto): Promise<InsertOutcome>;

  // ==================== Reads ====================

  /**
   * List messages ordered by timestamp ascending, then messageId ascending
   */
  listMessages(
    filter: MessageFilter,
    pagination: OffsetPagination,
  ): Promise<OffsetPage<Message>>;

  /**
   * Aggregate statistics over all messages
   */
  getStatistics(): Promise<MessageStatistics>;

  // ==================== Health & Lifecycle ====================

  /**
   * Check if storage is reachable and the schema is in place
   */
  isHealthy(): Promise<boolean>;

  /**
   * Release connections
   */
  close(): Promise<void>;
}
