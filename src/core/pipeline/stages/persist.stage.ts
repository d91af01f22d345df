import { PipelineStage, WebhookContext, StageResult } from '../types';
import { MessageStorageAdapter } from '../../interfaces';

/**
 * Stage 3: Persist
 * One idempotent insert; the store's uniqueness constraint decides
 * between CREATED and DUPLICATE. Storage failures propagate untouched.
 */
export class PersistStage implements PipelineStage {
  name = 'persist';

  constructor(private readonly storageAdapter: MessageStorageAdapter) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const payload = context.payload;

    if (!payload) {
      throw new Error('Persist stage reached without a validated payload');
    }

    const outcome = await this.storageAdapter.insertIfAbsent({
      messageId: payload.message_id,
      sender: payload.from,
      recipient: payload.to,
      timestamp: payload.ts,
      text: payload.text ?? null,
      receivedAt: context.receivedAt,
    });

    context.outcome = outcome;

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { messageId: payload.message_id, outcome },
    };
  }
}
