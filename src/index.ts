/**
 * Hookwarden
 *
 * Verifies signed webhook deliveries, deduplicates them by event id and
 * runs the routed handler at most once per event.
 */
import 'reflect-metadata';

// Export all core components
export * from './core';

// Export testing utilities from _shared
export {
  SignedWebhookFactory,
  TEST_WEBHOOK_SECRET,
} from './_shared/testing/signed-webhook-factory';
export type {
  WebhookOptions,
  SignedWebhook,
} from './_shared/testing/signed-webhook-factory';
export { ManualClock } from './_shared/testing/manual-clock';

// Export adapters
export * from './adapters/storage/memory';
export * from './adapters/storage/typeorm';

// Export NestJS module, services, controllers and tokens
export * from './modules';

// Export DTOs and Swagger decorators
export * from './_shared/dto';
export * from './_shared/swagger/decorators';
