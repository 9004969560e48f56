import { VerifiedEvent } from '../domain/models';

/**
 * What a handler may report back. Returning nothing counts as success.
 */
export type HandlerVerdict = { success: true } | { success: false; reason: string };

/**
 * Application-supplied handler for one or more event types. May throw or
 * reject; the router turns that into a failed HandlerResult.
 */
export type EventHandler<TBody = Record<string, unknown>> = (
  event: VerifiedEvent<TBody>,
) => Promise<HandlerVerdict | void> | HandlerVerdict | void;

/**
 * Handler registration
 */
export interface EventHandlerRegistration {
  /**
   * Subscription id, unique per registration
   */
  id: string;

  /**
   * Used in logs and handler results. Defaults to the handler's function
   * name or the pattern; only explicit names must be unique.
   */
  name: string;

  /**
   * Exact event type (`payment.succeeded`) or prefix wildcard (`payment.*`, `*`)
   */
  pattern: string;

  handler: EventHandler;
}

/**
 * Outcome of one dispatched handler invocation
 */
export type HandlerResult =
  | {
      success: true;
      handlerName: string;
      /**
       * False when the event fell through to the default no-op handler
       */
      handled: boolean;
      durationMs: number;
    }
  | {
      success: false;
      handlerName: string;
      reason: string;
      error?: Error;
      durationMs: number;
    };

/**
 * Handle returned from a registration
 */
export interface EventSubscription {
  id: string;
  name: string;
  unsubscribe: () => void;
}
