// Interface and type exports
export * from './clock.interface';
export * from './processing-store.interface';
export * from './event-handler.interface';
export * from './configuration.interface';
