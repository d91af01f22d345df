import { IngestionOutcome } from '../domain/enums';

/**
 * Emitted once per classified webhook request
 */
export interface WebhookOutcomeEvent {
  outcome: IngestionOutcome;
  messageId?: string;
  processingId: string;
  latencyMs: number;
}

export interface ErrorContext {
  operation: string;
  processingId?: string;
  messageId?: string;
  stage?: string;
}

/**
 * Lifecycle hooks for monitoring and metrics
 */
export interface LifecycleHooks {
  /**
   * Called when a webhook request has been classified
   */
  onWebhookOutcome?: (event: WebhookOutcomeEvent) => void | Promise<void>;

  /**
   * Called when processing fails (for example, the store is unavailable)
   */
  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}
