/**
 * Common types used across adapters
 */

/**
 * Data needed to persist a message
 */
export interface CreateMessageDto {
  messageId: string;
  sender: string;
  recipient: string;
  timestamp: string;
  text?: string | null;
  receivedAt?: Date;
}

/**
 * Message filters; every field that is set must match
 */
export interface MessageFilter {
  /**
   * Exact sender match
   */
  sender?: string;

  /**
   * Lower bound (inclusive) on the caller-supplied timestamp
   */
  since?: string;

  /**
   * Case-insensitive substring of the message text
   */
  contains?: string;
}

/**
 * Offset-based pagination parameters
 */
export interface OffsetPagination {
  limit: number;
  offset: number;
}

/**
 * One page of results plus the number of rows matching the filter
 */
export interface OffsetPage<T> {
  items: T[];
  total: number;
}

export interface SenderCount {
  sender: string;
  count: number;
}

/**
 * Aggregates over every stored message
 */
export interface MessageStatistics {
  totalMessages: number;
  sendersCount: number;
  /**
   * Top senders by message count, descending
   */
  messagesPerSender: SenderCount[];
  firstMessageTs: string | null;
  lastMessageTs: string | null;
}
