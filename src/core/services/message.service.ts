import { Message } from '../domain/models';
import { MessageStorageAdapter, MessageStatistics } from '../interfaces';

export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;

/**
 * Query parameters accepted by the listing endpoint
 */
export interface MessageListQuery {
  limit?: number;
  offset?: number;
  from?: string;
  since?: string;
  q?: string;
}

/**
 * Wire representation of a stored message
 */
export interface MessageView {
  message_id: string;
  from: string;
  to: string;
  ts: string;
  text: string | null;
}

export interface MessageListView {
  data: MessageView[];
  total: number;
  limit: number;
  offset: number;
}

export interface MessageStatsView {
  total_messages: number;
  senders_count: number;
  messages_per_sender: Array<{ from: string; count: number }>;
  first_message_ts: string | null;
  last_message_ts: string | null;
}

/**
 * Read-side service for listings and aggregate statistics.
 * Holds no state; every call goes straight to the storage adapter.
 */
export class MessageService {
  constructor(private readonly storageAdapter: MessageStorageAdapter) {}

  /**
   * List messages ordered by timestamp, with filters and pagination
   */
  async listMessages(query: MessageListQuery = {}): Promise<MessageListView> {
    const limit = Math.max(
      1,
      Math.min(query.limit ?? DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT),
    );
    const offset = Math.max(0, query.offset ?? 0);

    const page = await this.storageAdapter.listMessages(
      {
        sender: query.from,
        since: query.since,
        contains: query.q,
      },
      { limit, offset },
    );

    return {
      data: page.items.map(toMessageView),
      total: page.total,
      limit,
      offset,
    };
  }

  /**
   * Aggregate statistics over every stored message
   */
  async getStats(): Promise<MessageStatsView> {
    const stats: MessageStatistics = await this.storageAdapter.getStatistics();

    return {
      total_messages: stats.totalMessages,
      senders_count: stats.sendersCount,
      messages_per_sender: stats.messagesPerSender.map((entry) => ({
        from: entry.sender,
        count: entry.count,
      })),
      first_message_ts: stats.firstMessageTs,
      last_message_ts: stats.lastMessageTs,
    };
  }
}

export function toMessageView(message: Message): MessageView {
  return {
    message_id: message.messageId,
    from: message.sender,
    to: message.recipient,
    ts: message.timestamp,
    text: message.text,
  };
}
