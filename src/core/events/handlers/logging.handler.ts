import { Logger } from '@nestjs/common';
import { VerifiedEvent } from '../../domain/models';
import { EventHandler } from '../../interfaces';

/**
 * Logging event handler
 * Logs events for debugging; register it under a pattern no other handler claims.
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Pick<Logger, 'log'> = new Logger('WebhookEvents'),
    private readonly logLevel: 'verbose' | 'normal' | 'minimal' = 'normal',
  ) {}

  /**
   * Create the event handler function
   */
  getHandler(): EventHandler {
    return (event: VerifiedEvent) => {
      this.logger.log(`[${event.type}] ${JSON.stringify(this.prepareLogData(event))}`);
    };
  }

  /**
   * Prepare log data based on log level
   */
  prepareLogData(event: VerifiedEvent): Record<string, unknown> {
    switch (this.logLevel) {
      case 'verbose':
        return {
          eventId: event.id,
          eventType: event.type,
          createdAt: event.createdAt.toISOString(),
          body: event.body,
        };

      case 'minimal':
        return { eventId: event.id };

      case 'normal':
      default:
        return {
          eventId: event.id,
          eventType: event.type,
          createdAt: event.createdAt.toISOString(),
        };
    }
  }
}
