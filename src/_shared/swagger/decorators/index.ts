/**
 * Swagger decorators for the HTTP API
 *
 * Keep controllers focused on request handling.
 */

export * from './webhook.decorators';
export * from './health.decorators';
