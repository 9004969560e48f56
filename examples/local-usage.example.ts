/**
 * Example: Using Hookwarden in a NestJS application
 *
 * Register handlers for the event types you care about; everything else is
 * acknowledged without side effects.
 */

import { Injectable, Module, OnModuleInit } from '@nestjs/common';
import {
  HookwardenModule,
  HookwardenService,
  HandlerVerdict,
  LoggingEventHandler,
  VerifiedEvent,
} from '../src';

// billing.service.ts
@Injectable()
export class BillingService implements OnModuleInit {
  private readonly paidInvoices = new Set<string>();

  constructor(private readonly hookwarden: HookwardenService) {}

  onModuleInit() {
    this.hookwarden.on('invoice.paid', (event) => this.markPaid(event), 'mark-invoice-paid');

    // Anything else under invoice.* is only logged
    this.hookwarden.on('invoice.*', new LoggingEventHandler().getHandler(), 'invoice-log');
  }

  private markPaid(event: VerifiedEvent): HandlerVerdict | void {
    const data = event.body.data;
    if (
      typeof data !== 'object' ||
      data === null ||
      !('invoice' in data) ||
      typeof data.invoice !== 'string'
    ) {
      // Recorded as failed; the sender still gets 200
      return { success: false, reason: 'payload has no invoice reference' };
    }
    this.paidInvoices.add(data.invoice);
  }
}

// app.module.ts
@Module({
  imports: [
    HookwardenModule.forRoot({
      storage: {
        type: 'typeorm',
        options: {
          type: 'postgres',
          host: process.env.DB_HOST || 'localhost',
          port: parseInt(process.env.DB_PORT || '5432', 10),
          database: process.env.DB_NAME || 'myapp',
          username: process.env.DB_USERNAME || 'postgres',
          password: process.env.DB_PASSWORD || 'postgres',
          synchronize: process.env.NODE_ENV !== 'production',
        },
      },
      verification: {
        // Current and previous secret during rotation
        secrets: (process.env.WEBHOOK_SECRETS || '').split(','),
        toleranceSeconds: 300,
      },
      processingMode: 'deferred',
      retention: { retentionDays: 30, autoCleanup: true },
      hooks: {
        onVerificationFailed: ({ reason, source }) => {
          console.warn(`Rejected delivery from ${source}: ${reason}`);
        },
      },
    }),
  ],
  providers: [BillingService],
})
export class AppModule {}
