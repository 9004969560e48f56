/**
 * Event routing
 */

export { EventRouter, RouteRegistrationError, DEFAULT_HANDLER_NAME } from './event-router';

// Built-in event handlers
export { LoggingEventHandler } from './handlers/logging.handler';
