/**
 * Hookwarden Core - verification, deduplication and routing of signed
 * webhook deliveries. Storage and framework agnostic.
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Components
export * from './verification';
export * from './deduplication';
export * from './events';

// Webhook processing pipeline
export * from './pipeline';
