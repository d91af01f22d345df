/**
 * DTOs for the inbox API
 *
 * Input validation and Swagger documentation for every endpoint.
 */

export * from './webhook-message.dto';
export * from './list-messages.dto';
export * from './webhook-response.dto';
