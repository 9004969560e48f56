export * from './event-deduplicator';
