import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

/**
 * TypeORM entity for Message
 *
 * The primary key on message_id is what makes inserts idempotent.
 */
@Entity('messages')
@Index('idx_from_msisdn', ['sender'])
@Index('idx_ts', ['timestamp'])
export class MessageEntity {
  @PrimaryColumn({ type: 'varchar', name: 'message_id' })
  messageId!: string;

  @Column({ type: 'varchar', name: 'from_msisdn' })
  sender!: string;

  @Column({ type: 'varchar', name: 'to_msisdn' })
  recipient!: string;

  @Column({ type: 'varchar', name: 'ts' })
  timestamp!: string;

  @Column({ type: 'text', nullable: true })
  text!: string | null;

  /**
   * Server-side ingestion instant, ISO-8601
   */
  @Column({ type: 'varchar', name: 'created_at' })
  receivedAt!: string;
}
