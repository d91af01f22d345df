/**
 * Webhook ingestion pipeline
 *
 * 1. Verification - validate the HMAC signature of the raw body
 * 2. Validation - parse and check the message fields
 * 3. Persist - insert once per message_id
 */

// Main processor
export { WebhookProcessor } from './webhook-processor';
export type { IncomingHeaders } from './webhook-processor';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { VerificationStage } from './stages/verification.stage';
export { ValidationStage, toFieldViolation } from './stages/validation.stage';
export { PersistStage } from './stages/persist.stage';
