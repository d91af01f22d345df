import { IngestionOutcome } from '../domain/enums';
import { MessageStorageAdapter, LifecycleHooks } from '../interfaces';
import type { WebhookMessageDto } from '../../_shared/dto/webhook-message.dto';

/**
 * A single field that failed validation
 */
export interface FieldViolation {
  field: string;
  messages: string[];
}

/**
 * Webhook processing context passed through the pipeline
 */
export interface WebhookContext {
  // Raw input
  rawBody: Buffer;
  headers: Record<string, string>;
  receivedAt: Date;

  // Processing metadata
  processingId: string;

  // Verification results
  signatureValid?: boolean;

  // Validation results
  payload?: WebhookMessageDto;
  violations?: FieldViolation[];

  // Processing outcome
  outcome?: IngestionOutcome;
  error?: Error;

  // Metrics
  processingDurationMs?: number;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: WebhookContext;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: WebhookContext): Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  storageAdapter: MessageStorageAdapter;

  /**
   * Shared signing secret; when absent every request is rejected
   */
  secret?: string;

  /**
   * Header holding the signature (default: x-signature)
   */
  signatureHeader?: string;

  hooks?: LifecycleHooks;
}

/**
 * Processing result returned by the pipeline
 */
export interface ProcessingResult {
  /**
   * True for CREATED and DUPLICATE
   */
  success: boolean;
  outcome: IngestionOutcome;
  messageId?: string;
  violations?: FieldViolation[];
  context: WebhookContext;
  metrics: ProcessingMetrics;
}

/**
 * Processing metrics
 */
export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
  signatureVerified: boolean;
  validated: boolean;
  persisted: boolean;
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly context: WebhookContext,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
