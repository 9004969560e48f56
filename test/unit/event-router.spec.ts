import {
  DEFAULT_HANDLER_NAME,
  EventRouter,
  LoggingEventHandler,
  RouteRegistrationError,
  VerifiedEvent,
} from '../../src';

function makeEvent(type: string, id = 'evt_1'): VerifiedEvent {
  const at = new Date('2024-01-15T12:00:00.000Z');
  return { id, type, createdAt: at, signedAt: at, body: { id, type } };
}

describe('EventRouter', () => {
  let router: EventRouter;

  beforeEach(() => {
    router = new EventRouter();
  });

  describe('Routing', () => {
    it('should dispatch to the handler registered for the exact type', async () => {
      const handler = jest.fn();
      router.on('invoice.paid', handler, 'mark-paid');
      const event = makeEvent('invoice.paid');

      const result = await router.dispatch(event);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(event);
      expect(result).toMatchObject({ success: true, handlerName: 'mark-paid', handled: true });
    });

    it('should use the first matching route in registration order', async () => {
      const wildcard = jest.fn();
      const exact = jest.fn();
      router.on('invoice.*', wildcard, 'invoices');
      router.on('invoice.paid', exact, 'paid');

      const result = await router.dispatch(makeEvent('invoice.paid'));

      expect(wildcard).toHaveBeenCalledTimes(1);
      expect(exact).not.toHaveBeenCalled();
      expect(result.handlerName).toBe('invoices');
    });

    it('should match prefix wildcards on whole segments only', () => {
      router.on('invoice.*', jest.fn(), 'invoices');

      expect(router.resolve('invoice.paid')?.name).toBe('invoices');
      expect(router.resolve('invoice.payment.failed')?.name).toBe('invoices');
      expect(router.resolve('invoice')).toBeUndefined();
      expect(router.resolve('invoices.paid')).toBeUndefined();
    });

    it('should route everything to a catch-all', () => {
      router.on('*', jest.fn(), 'all');

      expect(router.resolve('anything.at.all')?.name).toBe('all');
    });

    it('should acknowledge unrouted types with the default no-op', async () => {
      router.on('invoice.paid', jest.fn(), 'paid');

      const result = await router.dispatch(makeEvent('customer.created'));

      expect(result).toMatchObject({
        success: true,
        handlerName: DEFAULT_HANDLER_NAME,
        handled: false,
      });
    });
  });

  describe('Handler failures', () => {
    it('should convert a thrown error into a failed result', async () => {
      const error = new Error('ledger unavailable');
      router.on('invoice.paid', () => {
        throw error;
      }, 'mark-paid');

      const result = await router.dispatch(makeEvent('invoice.paid'));

      expect(result).toMatchObject({
        success: false,
        handlerName: 'mark-paid',
        reason: 'ledger unavailable',
        error,
      });
    });

    it('should convert a rejected promise into a failed result', async () => {
      router.on('invoice.paid', async () => {
        throw new Error('timeout');
      }, 'mark-paid');

      const result = await router.dispatch(makeEvent('invoice.paid'));

      expect(result.success).toBe(false);
      expect(!result.success && result.reason).toBe('timeout');
    });

    it('should treat a failure verdict as a failed result', async () => {
      router.on('invoice.paid', () => ({ success: false, reason: 'unknown invoice' }), 'mark-paid');

      const result = await router.dispatch(makeEvent('invoice.paid'));

      expect(result).toMatchObject({ success: false, reason: 'unknown invoice' });
      expect(!result.success && result.error).toBeUndefined();
    });

    it('should treat a success verdict as handled', async () => {
      router.on('invoice.paid', async () => ({ success: true }), 'mark-paid');

      const result = await router.dispatch(makeEvent('invoice.paid'));

      expect(result).toMatchObject({ success: true, handled: true });
    });
  });

  describe('Registration', () => {
    it.each(['', 'invoice*', '*.paid', 'invoice.*.paid', '.*', '**'])(
      'should reject invalid pattern %p',
      (pattern) => {
        expect(() => router.on(pattern, jest.fn(), 'h')).toThrow(RouteRegistrationError);
      },
    );

    it('should reject a second handler for the same pattern', () => {
      router.on('invoice.paid', jest.fn(), 'first');

      expect(() => router.on('invoice.paid', jest.fn(), 'second')).toThrow(
        'A handler is already registered for "invoice.paid"',
      );
    });

    it('should reject a duplicate handler name', () => {
      router.on('invoice.paid', jest.fn(), 'billing');

      expect(() => router.on('invoice.voided', jest.fn(), 'billing')).toThrow(
        'Handler name "billing" is already in use',
      );
    });

    it('should let one named function serve several patterns', async () => {
      const calls: string[] = [];
      function handleInvoice(event: VerifiedEvent): void {
        calls.push(event.type);
      }

      const paid = router.on('invoice.paid', handleInvoice);
      const refunded = router.on('invoice.refunded', handleInvoice);

      await router.dispatch(makeEvent('invoice.paid'));
      await router.dispatch(makeEvent('invoice.refunded', 'evt_2'));

      expect(calls).toEqual(['invoice.paid', 'invoice.refunded']);
      expect(paid.name).toBe('handleInvoice');
      expect(refunded.name).toBe('handleInvoice');
      expect(paid.id).not.toBe(refunded.id);
    });

    it('should remove only its own registration on unsubscribe', () => {
      function handleInvoice(): void {}
      const paid = router.on('invoice.paid', handleInvoice);
      router.on('invoice.refunded', handleInvoice);

      paid.unsubscribe();

      expect(router.resolve('invoice.paid')).toBeUndefined();
      expect(router.resolve('invoice.refunded')?.name).toBe('handleInvoice');
    });

    it('should reject an explicit name already taken by a default name', () => {
      function handleInvoice(): void {}
      router.on('invoice.paid', handleInvoice);

      expect(() => router.on('invoice.voided', jest.fn(), 'handleInvoice')).toThrow(
        RouteRegistrationError,
      );
    });

    it('should name anonymous handlers after their pattern', () => {
      const subscription = router.on('invoice.paid', () => undefined);

      expect(subscription.name).toBe('invoice.paid');
      expect(router.hasHandler('invoice.paid')).toBe(true);
    });

    it('should remove a route on unsubscribe', () => {
      const subscription = router.on('invoice.paid', jest.fn(), 'paid');

      subscription.unsubscribe();

      expect(router.hasHandler('paid')).toBe(false);
      expect(router.resolve('invoice.paid')).toBeUndefined();
    });

    it('should clear all routes', () => {
      router.on('a.b', jest.fn(), 'one');
      router.on('c.*', jest.fn(), 'two');

      router.clearHandlers();

      expect(router.getHandlers()).toEqual([]);
    });
  });

  describe('LoggingEventHandler', () => {
    it('should log the event at the chosen detail level', async () => {
      const logger = { log: jest.fn() };
      router.on('*', new LoggingEventHandler(logger, 'minimal').getHandler(), 'log');

      const result = await router.dispatch(makeEvent('invoice.paid', 'evt_9'));

      expect(result.success).toBe(true);
      expect(logger.log).toHaveBeenCalledWith('[invoice.paid] {"eventId":"evt_9"}');
    });

    it('should include timestamps and body when verbose', () => {
      const data = new LoggingEventHandler({ log: jest.fn() }, 'verbose').prepareLogData(
        makeEvent('invoice.paid'),
      );

      expect(data).toEqual({
        eventId: 'evt_1',
        eventType: 'invoice.paid',
        createdAt: '2024-01-15T12:00:00.000Z',
        body: { id: 'evt_1', type: 'invoice.paid' },
      });
    });
  });
});
