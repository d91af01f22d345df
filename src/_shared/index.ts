/**
 * Shared resources for the inbox API
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators
export * from './swagger/decorators';

// Testing utilities
export * from './testing/signed-webhook-factory';
