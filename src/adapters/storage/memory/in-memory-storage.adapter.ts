import {
  MessageStorageAdapter,
  Message,
  IngestionOutcome,
  InsertOutcome,
  CreateMessageDto,
  MessageFilter,
  MessageStatistics,
  OffsetPage,
  OffsetPagination,
  SenderCount,
  StorageUnavailableError,
  TOP_SENDERS_LIMIT,
} from '../../../core';

export interface InMemoryStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
}

/**
 * In-memory storage adapter for tests and local runs
 *
 * The duplicate check and the write happen in one synchronous step after
 * the last await, so concurrent inserts of the same id cannot interleave.
 */
export class InMemoryStorageAdapter implements MessageStorageAdapter {
  private readonly messages: Map<string, Message> = new Map();
  private available = true;
  private readonly options: Required<InMemoryStorageOptions>;

  constructor(options: InMemoryStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs > 0) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  private assertAvailable(operation: string): void {
    if (!this.available) {
      throw new StorageUnavailableError(`Storage unavailable during ${operation}`);
    }
  }

  // ==================== Writes ====================

  async insertIfAbsent(dto: CreateMessageDto): Promise<InsertOutcome> {
    await this.simulateLatency();
    this.assertAvailable('insert');

    if (this.messages.has(dto.messageId)) {
      return IngestionOutcome.DUPLICATE;
    }

    this.messages.set(
      dto.messageId,
      new Message(
        dto.messageId,
        dto.sender,
        dto.recipient,
        dto.timestamp,
        dto.text ?? null,
        dto.receivedAt ?? new Date(),
      ),
    );

    return IngestionOutcome.CREATED;
  }

  // ==================== Reads ====================

  async listMessages(
    filter: MessageFilter,
    pagination: OffsetPagination,
  ): Promise<OffsetPage<Message>> {
    await this.simulateLatency();
    this.assertAvailable('list');

    const matching = Array.from(this.messages.values())
      .filter((message) => matchesFilter(message, filter))
      .sort(compareByTimestamp);

    return {
      items: matching.slice(
        pagination.offset,
        pagination.offset + pagination.limit,
      ),
      total: matching.length,
    };
  }

  async getStatistics(): Promise<MessageStatistics> {
    await this.simulateLatency();
    this.assertAvailable('statistics');

    const perSender = new Map<string, number>();
    let firstMessageTs: string | null = null;
    let lastMessageTs: string | null = null;

    for (const message of this.messages.values()) {
      perSender.set(message.sender, (perSender.get(message.sender) ?? 0) + 1);

      if (firstMessageTs === null || message.timestamp < firstMessageTs) {
        firstMessageTs = message.timestamp;
      }
      if (lastMessageTs === null || message.timestamp > lastMessageTs) {
        lastMessageTs = message.timestamp;
      }
    }

    const messagesPerSender: SenderCount[] = Array.from(perSender.entries())
      .map(([sender, count]) => ({ sender, count }))
      .sort((a, b) => b.count - a.count || compareStrings(a.sender, b.sender))
      .slice(0, TOP_SENDERS_LIMIT);

    return {
      totalMessages: this.messages.size,
      sendersCount: perSender.size,
      messagesPerSender,
      firstMessageTs,
      lastMessageTs,
    };
  }

  // ==================== Health & Lifecycle ====================

  async isHealthy(): Promise<boolean> {
    return this.available;
  }

  async close(): Promise<void> {
    // nothing to release
  }

  // ==================== Test Helpers ====================

  /**
   * Toggle availability; while unavailable every operation throws
   * StorageUnavailableError
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /**
   * Number of stored rows
   */
  size(): number {
    return this.messages.size;
  }

  clear(): void {
    this.messages.clear();
  }
}

function matchesFilter(message: Message, filter: MessageFilter): boolean {
  if (filter.sender !== undefined && message.sender !== filter.sender) {
    return false;
  }
  if (filter.since !== undefined && message.timestamp < filter.since) {
    return false;
  }
  if (filter.contains !== undefined && !message.textContains(filter.contains)) {
    return false;
  }
  return true;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareByTimestamp(a: Message, b: Message): number {
  return (
    compareStrings(a.timestamp, b.timestamp) ||
    compareStrings(a.messageId, b.messageId)
  );
}
