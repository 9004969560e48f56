/**
 * Shared Resources
 *
 * Centralized exports for components used across the application
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger/decorators';

// Testing utilities
export * from './testing/signed-webhook-factory';
export * from './testing/manual-clock';
