import {
  DataSource,
  QueryFailedError,
  Repository,
  SelectQueryBuilder,
} from 'typeorm';
import { Logger } from '@nestjs/common';
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
  StorageUnavailableError,
  TOP_SENDERS_LIMIT,
  toError,
} from '../../../core';
import { MessageEntity } from './entities';

/**
 * Driver error codes for a primary key / unique constraint violation
 */
const UNIQUE_VIOLATION_CODES = new Set([
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_UNIQUE',
  '23505', // PostgreSQL unique_violation
]);

/**
 * TypeORM implementation of MessageStorageAdapter (SQLite or PostgreSQL)
 */
export class TypeORMStorageAdapter implements MessageStorageAdapter {
  private readonly logger = new Logger(TypeORMStorageAdapter.name);
  private readonly messageRepo: Repository<MessageEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.messageRepo = dataSource.getRepository(MessageEntity);
  }

  /**
   * Message Writes
   */

  async insertIfAbsent(dto: CreateMessageDto): Promise<InsertOutcome> {
    try {
      // The primary key decides; a lost race is a constraint violation
      await this.messageRepo.insert({
        messageId: dto.messageId,
        sender: dto.sender,
        recipient: dto.recipient,
        timestamp: dto.timestamp,
        text: dto.text ?? null,
        receivedAt: (dto.receivedAt ?? new Date()).toISOString(),
      });
      return IngestionOutcome.CREATED;
    } catch (error) {
      if (isUniqueViolation(error)) {
        return IngestionOutcome.DUPLICATE;
      }
      throw new StorageUnavailableError('Failed to insert message', toError(error));
    }
  }

  /**
   * Message Reads
   */

  async listMessages(
    filter: MessageFilter,
    pagination: OffsetPagination,
  ): Promise<OffsetPage<Message>> {
    return this.guard('list messages', async () => {
      // The window count makes page and total one statement, one snapshot
      const qb = this.messageRepo
        .createQueryBuilder('m')
        .addSelect('COUNT(*) OVER ()', 'total');
      this.applyFilter(qb, filter);

      qb.orderBy('m.timestamp', 'ASC');
      qb.addOrderBy('m.messageId', 'ASC');
      qb.offset(pagination.offset);
      qb.limit(pagination.limit);

      const { entities, raw } = await qb.getRawAndEntities<{
        total: number | string;
      }>();

      if (raw.length > 0) {
        return {
          items: entities.map((e) => this.mapMessageEntityToDomain(e)),
          total: Number(raw[0].total),
        };
      }

      // An empty page past the first one still reports how many rows match
      const countQb = this.messageRepo.createQueryBuilder('m');
      this.applyFilter(countQb, filter);
      const total = pagination.offset > 0 ? await countQb.getCount() : 0;

      return { items: [], total };
    });
  }

  async getStatistics(): Promise<MessageStatistics> {
    return this.guard('read statistics', async () => {
      // One grouped statement; the totals are folded from its rows
      const perSender = await this.messageRepo
        .createQueryBuilder('m')
        .select('m.sender', 'sender')
        .addSelect('COUNT(*)', 'count')
        .addSelect('MIN(m.timestamp)', 'first')
        .addSelect('MAX(m.timestamp)', 'last')
        .groupBy('m.sender')
        .orderBy('COUNT(*)', 'DESC')
        .addOrderBy('m.sender', 'ASC')
        .getRawMany<{
          sender: string;
          count: number | string;
          first: string;
          last: string;
        }>();

      let totalMessages = 0;
      let firstMessageTs: string | null = null;
      let lastMessageTs: string | null = null;

      for (const row of perSender) {
        totalMessages += Number(row.count);
        if (firstMessageTs === null || row.first < firstMessageTs) {
          firstMessageTs = row.first;
        }
        if (lastMessageTs === null || row.last > lastMessageTs) {
          lastMessageTs = row.last;
        }
      }

      return {
        totalMessages,
        sendersCount: perSender.length,
        messagesPerSender: perSender.slice(0, TOP_SENDERS_LIMIT).map((row) => ({
          sender: row.sender,
          count: Number(row.count),
        })),
        firstMessageTs,
        lastMessageTs,
      };
    });
  }

  /**
   * Health & Lifecycle
   */

  async isHealthy(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }

    try {
      await this.dataSource.query(
        `SELECT 1 FROM ${this.messageRepo.metadata.tableName} LIMIT 1`,
      );
      return true;
    } catch (error) {
      this.logger.warn(`Health check failed: ${toError(error).message}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  /**
   * Private Helpers
   */

  private applyFilter(
    qb: SelectQueryBuilder<MessageEntity>,
    filter: MessageFilter,
  ): void {
    if (filter.sender !== undefined) {
      qb.andWhere('m.sender = :sender', { sender: filter.sender });
    }
    if (filter.since !== undefined) {
      qb.andWhere('m.timestamp >= :since', { since: filter.since });
    }
    if (filter.contains !== undefined) {
      qb.andWhere("LOWER(m.text) LIKE LOWER(:pattern) ESCAPE '\\'", {
        pattern: `%${escapeLikePattern(filter.contains)}%`,
      });
    }
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw new StorageUnavailableError(`Failed to ${operation}`, toError(error));
    }
  }

  private mapMessageEntityToDomain(entity: MessageEntity): Message {
    return new Message(
      entity.messageId,
      entity.sender,
      entity.recipient,
      entity.timestamp,
      entity.text,
      new Date(entity.receivedAt),
    );
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
