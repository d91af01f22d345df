/**
 * Webhook Inbox
 *
 * Signed message webhooks, stored once per message_id, with listing,
 * statistics and operational probes.
 */

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/storage/memory';
export * from './adapters/storage/typeorm';

// Export NestJS module, controllers, services and tokens
export * from './modules';

// Export DTOs, Swagger decorators and testing utilities
export * from './_shared';

// Export HTTP application wiring
export * from './app.setup';
