/**
 * Swagger decorators for the inbox API
 *
 * Keeps route documentation out of the controllers.
 */

export * from './webhook.decorators';
export * from './messages.decorators';
export * from './health.decorators';
