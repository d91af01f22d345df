import { PipelineStage, WebhookContext, StageResult } from '../types';
import { IngestionOutcome } from '../../domain/enums';
import { verifySignature } from '../../signature';

/**
 * Stage 1: Signature Verification
 * Rejects the request before the body is parsed when the HMAC does not match
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';

  constructor(
    private readonly secret: string | undefined,
    private readonly signatureHeader: string,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const isValid = verifySignature(
      context.rawBody,
      context.headers[this.signatureHeader],
      this.secret,
    );

    context.signatureValid = isValid;

    if (!isValid) {
      context.outcome = IngestionOutcome.INVALID_SIGNATURE;

      return {
        success: true, // the request was classified
        context,
        shouldContinue: false,
        metadata: { secretConfigured: Boolean(this.secret) },
      };
    }

    return {
      success: true,
      context,
      shouldContinue: true,
    };
  }
}
