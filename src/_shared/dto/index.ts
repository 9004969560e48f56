/**
 * DTOs for the HTTP API, with Swagger documentation
 */

export * from './webhook.dto';
export * from './health.dto';
