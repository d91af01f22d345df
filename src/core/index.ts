/**
 * Webhook Inbox Core - signature verification, ingestion pipeline and
 * read services. Storage agnostic.
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/errors';

// Interfaces and contracts
export * from './interfaces';

// Signature verification
export * from './signature';

// Webhook processing pipeline
export * from './pipeline';

// Core services
export * from './services';
