import { Logger } from '@nestjs/common';
import { VerifiedEvent } from '../domain/models';
import {
  EventHandler,
  EventHandlerRegistration,
  EventSubscription,
  HandlerResult,
  HandlerVerdict,
} from '../interfaces';

export const DEFAULT_HANDLER_NAME = 'unrouted';

/**
 * Route registration error
 */
export class RouteRegistrationError extends Error {
  constructor(
    message: string,
    public readonly pattern: string,
  ) {
    super(message);
    this.name = 'RouteRegistrationError';
  }
}

/**
 * Event Router
 *
 * Maps an event type to exactly one handler. Routes are consulted in
 * registration order and the first matching pattern wins. Types with no
 * route go to a no-op default that records nothing but a log line.
 *
 * Handler errors are contained: `dispatch` always resolves to a HandlerResult.
 */
export class EventRouter {
  private readonly logger = new Logger(EventRouter.name);
  private routes: EventHandlerRegistration[] = [];
  private subscriptionIdCounter = 0;

  /**
   * Register a handler for an exact type, a `prefix.*` wildcard, or `*`.
   * The same handler function may serve several patterns.
   */
  on(pattern: string, handler: EventHandler, name?: string): EventSubscription {
    if (!isValidPattern(pattern)) {
      throw new RouteRegistrationError(`Invalid route pattern: "${pattern}"`, pattern);
    }
    if (this.routes.some((r) => r.pattern === pattern)) {
      throw new RouteRegistrationError(
        `A handler is already registered for "${pattern}"`,
        pattern,
      );
    }
    if (name !== undefined && this.hasHandler(name)) {
      throw new RouteRegistrationError(
        `Handler name "${name}" is already in use`,
        pattern,
      );
    }

    const registration: EventHandlerRegistration = {
      id: `sub_${++this.subscriptionIdCounter}`,
      name: name ?? (handler.name || pattern),
      pattern,
      handler,
    };

    this.routes.push(registration);
    this.logger.log(`Registered handler "${registration.name}" for ${pattern}`);

    return {
      id: registration.id,
      name: registration.name,
      unsubscribe: () => this.unsubscribe(registration.id),
    };
  }

  /**
   * Remove exactly one registration
   */
  unsubscribe(subscriptionId: string): void {
    this.routes = this.routes.filter((r) => r.id !== subscriptionId);
  }

  /**
   * Remove every registration carrying this name
   */
  off(name: string): void {
    this.routes = this.routes.filter((r) => r.name !== name);
  }

  clearHandlers(): void {
    this.routes = [];
  }

  hasHandler(name: string): boolean {
    return this.routes.some((r) => r.name === name);
  }

  getHandlers(): EventHandlerRegistration[] {
    return [...this.routes];
  }

  /**
   * The registration an event of this type would be dispatched to
   */
  resolve(eventType: string): EventHandlerRegistration | undefined {
    return this.routes.find((r) => matches(r.pattern, eventType));
  }

  /**
   * Invoke the single matching handler, converting throws and rejections
   * into a failed result
   */
  async dispatch(event: VerifiedEvent): Promise<HandlerResult> {
    const route = this.resolve(event.type);
    const startTime = Date.now();

    if (!route) {
      this.logger.log(
        `No handler for event type ${event.type}; acknowledged without side effects (${event.id})`,
      );
      return {
        success: true,
        handlerName: DEFAULT_HANDLER_NAME,
        handled: false,
        durationMs: Date.now() - startTime,
      };
    }

    try {
      const verdict = await route.handler(event);
      const durationMs = Date.now() - startTime;

      if (isFailureVerdict(verdict)) {
        return {
          success: false,
          handlerName: route.name,
          reason: verdict.reason,
          durationMs,
        };
      }

      return {
        success: true,
        handlerName: route.name,
        handled: true,
        durationMs,
      };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Handler "${route.name}" failed for ${event.type} (${event.id}): ${err.message}`,
        err.stack,
      );

      return {
        success: false,
        handlerName: route.name,
        reason: err.message,
        error: err,
        durationMs: Date.now() - startTime,
      };
    }
  }
}

function matches(pattern: string, eventType: string): boolean {
  if (pattern === '*') {
    return true;
  }
  if (pattern.endsWith('.*')) {
    return eventType.startsWith(pattern.slice(0, -1));
  }
  return pattern === eventType;
}

function isValidPattern(pattern: string): boolean {
  if (pattern.length === 0) {
    return false;
  }
  const wildcard = pattern.indexOf('*');
  return (
    wildcard === -1 ||
    pattern === '*' ||
    (wildcard === pattern.length - 1 && pattern.endsWith('.*') && pattern.length > 2)
  );
}

function isFailureVerdict(
  verdict: HandlerVerdict | void,
): verdict is { success: false; reason: string } {
  return typeof verdict === 'object' && verdict !== null && verdict.success === false;
}
