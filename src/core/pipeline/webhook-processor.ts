import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  PipelineConfig,
  PipelineStage,
  WebhookContext,
  ProcessingResult,
  ProcessingMetrics,
  PipelineError,
} from './types';
import { VerificationStage } from './stages/verification.stage';
import { ValidationStage } from './stages/validation.stage';
import { PersistStage } from './stages/persist.stage';
import { IngestionOutcome } from '../domain/enums';
import { StorageUnavailableError, toError } from '../domain/errors';
import { LifecycleHooks } from '../interfaces';
import { SIGNATURE_HEADER } from '../signature';

export type IncomingHeaders = Record<string, string | string[] | undefined>;

/**
 * WebhookProcessor orchestrates the ingestion pipeline
 *
 * Pipeline stages:
 * 1. Verification - HMAC signature over the raw body
 * 2. Validation - JSON parsing and field checks
 * 3. Persist - idempotent insert keyed by message_id
 *
 * Each request makes at most one persistence attempt. Storage failures are
 * rethrown to the caller; retrying is the sender's job.
 */
export class WebhookProcessor {
  private readonly logger = new Logger(WebhookProcessor.name);
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;
  private readonly signatureHeader: string;

  constructor(private readonly config: PipelineConfig) {
    this.hooks = config.hooks;
    this.signatureHeader = (
      config.signatureHeader ?? SIGNATURE_HEADER
    ).toLowerCase();

    this.stages = this.initializeStages();
  }

  /**
   * Process a webhook through the pipeline
   */
  async processWebhook(
    rawBody: Buffer,
    headers: IncomingHeaders,
  ): Promise<ProcessingResult> {
    const startTime = Date.now();

    const context: WebhookContext = {
      rawBody,
      headers: this.normalizeHeaders(headers),
      receivedAt: new Date(),
      processingId: uuidv4(),
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
      signatureVerified: false,
      validated: false,
      persisted: false,
    };

    try {
      await this.executePipeline(context, metrics);
    } catch (error) {
      const failure = toError(error);
      context.error = failure;
      context.processingDurationMs = Date.now() - startTime;
      metrics.totalDurationMs = context.processingDurationMs;

      this.logger.error(
        `Pipeline error for ${context.processingId}: ${failure.message}`,
        failure.stack,
      );

      await this.runHook('onError', () =>
        this.hooks?.onError?.(failure, {
          operation: 'webhook-processing',
          processingId: context.processingId,
          messageId: context.payload?.message_id,
          stage: error instanceof PipelineError ? error.stage : undefined,
        }),
      );

      throw failure;
    }

    const outcome = context.outcome;
    if (!outcome) {
      throw new PipelineError(
        'Pipeline finished without an outcome',
        'pipeline',
        context,
      );
    }

    context.processingDurationMs = Date.now() - startTime;
    metrics.totalDurationMs = context.processingDurationMs;

    const messageId = context.payload?.message_id;

    await this.runHook('onWebhookOutcome', () =>
      this.hooks?.onWebhookOutcome?.({
        outcome,
        messageId,
        processingId: context.processingId,
        latencyMs: context.processingDurationMs ?? 0,
      }),
    );

    return {
      success:
        outcome === IngestionOutcome.CREATED ||
        outcome === IngestionOutcome.DUPLICATE,
      outcome,
      messageId,
      violations: context.violations,
      context,
      metrics,
    };
  }

  /**
   * Execute the pipeline stages sequentially
   */
  private async executePipeline(
    context: WebhookContext,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);

        const durationMs = Date.now() - stageStartTime;
        metrics.stageDurations.set(stage.name, durationMs);
        this.logger.debug(
          `Stage ${stage.name} for ${context.processingId} took ${durationMs}ms` +
            (result.metadata ? ` ${JSON.stringify(result.metadata)}` : ''),
        );

        if (!result.shouldContinue) {
          break;
        }

        this.updateMetrics(stage.name, metrics);
      } catch (error) {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        if (error instanceof StorageUnavailableError) {
          throw error;
        }

        const cause = toError(error);
        throw new PipelineError(
          `Stage '${stage.name}' failed: ${cause.message}`,
          stage.name,
          context,
          cause,
        );
      }
    }
  }

  private initializeStages(): PipelineStage[] {
    return [
      new VerificationStage(this.config.secret, this.signatureHeader),
      new ValidationStage(),
      new PersistStage(this.config.storageAdapter),
    ];
  }

  /**
   * Lower-case header names and keep the first value of repeated headers
   */
  private normalizeHeaders(headers: IncomingHeaders): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      const first = Array.isArray(value) ? value[0] : value;
      if (first !== undefined) {
        normalized[key.toLowerCase()] = first;
      }
    }
    return normalized;
  }

  private updateMetrics(stageName: string, metrics: ProcessingMetrics): void {
    switch (stageName) {
      case 'verification':
        metrics.signatureVerified = true;
        break;
      case 'validation':
        metrics.validated = true;
        break;
      case 'persist':
        metrics.persisted = true;
        break;
    }
  }

  /**
   * Hooks observe outcomes; a failing hook must not change the response
   * of a request whose write already committed.
   */
  private async runHook(
    name: keyof LifecycleHooks,
    invoke: () => void | Promise<void> | undefined,
  ): Promise<void> {
    try {
      await invoke();
    } catch (error) {
      this.logger.warn(`Lifecycle hook ${name} failed: ${toError(error).message}`);
    }
  }

  /**
   * Whether a signing secret is configured
   */
  isSecretConfigured(): boolean {
    return Boolean(this.config.secret);
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): {
    stages: string[];
    configuration: {
      signatureHeader: string;
      secretConfigured: boolean;
    };
  } {
    return {
      stages: this.stages.map((s) => s.name),
      configuration: {
        signatureHeader: this.signatureHeader,
        secretConfigured: this.isSecretConfigured(),
      },
    };
  }
}
