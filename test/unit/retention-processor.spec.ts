import {
  ManualClock,
  MemoryProcessingStore,
  ProcessingStore,
  RetentionProcessor,
  mergeHookwardenConfig,
} from '../../src';

describe('RetentionProcessor', () => {
  const config = mergeHookwardenConfig({
    storage: { type: 'memory' },
    verification: { secrets: ['whsec_test_secret'] },
    retention: { retentionDays: 7 },
  });

  let store: MemoryProcessingStore;
  let clock: ManualClock;
  let processor: RetentionProcessor;

  const claim = (eventId: string) =>
    store.claim({
      eventId,
      eventType: 'invoice.paid',
      now: clock.now(),
      staleAfterMs: 60_000,
      maxAttempts: 2,
    });

  beforeEach(() => {
    store = new MemoryProcessingStore();
    clock = new ManualClock();
    processor = new RetentionProcessor(store, config, clock);
  });

  afterEach(() => {
    processor.onModuleDestroy();
  });

  it('should purge records older than the retention window', async () => {
    await claim('evt_old');
    clock.advanceSeconds(3 * 86400);
    await claim('evt_recent');
    clock.advanceSeconds(5 * 86400);

    const removed = await processor.purgeExpired();

    expect(removed).toBe(1);
    expect(await store.find('evt_old')).toBeNull();
    expect(await store.find('evt_recent')).not.toBeNull();
  });

  it('should keep records exactly at the cutoff', async () => {
    await claim('evt_1');
    clock.advanceSeconds(7 * 86400);

    await expect(processor.purgeExpired()).resolves.toBe(0);
  });

  it('should default retention to 30 days', () => {
    const defaults = mergeHookwardenConfig({
      storage: { type: 'memory' },
      verification: { secrets: ['whsec_test_secret'] },
    });

    expect(new RetentionProcessor(store, defaults, clock).retentionDays).toBe(30);
  });

  it('should log and contain store failures', async () => {
    const failing: ProcessingStore = {
      claim: jest.fn(),
      complete: jest.fn(),
      find: jest.fn(),
      purgeOlderThan: jest.fn().mockRejectedValue(new Error('connection refused')),
      countByStatus: jest.fn(),
      isHealthy: jest.fn(),
    };

    await expect(
      new RetentionProcessor(failing, config, clock).purgeExpired(),
    ).resolves.toBe(0);
  });

  it('should only run on a timer when auto cleanup is enabled', () => {
    jest.useFakeTimers();
    try {
      const purge = jest.spyOn(store, 'purgeOlderThan');
      const timed = new RetentionProcessor(
        store,
        mergeHookwardenConfig({
          ...config,
          retention: { retentionDays: 7, autoCleanup: true, cleanupIntervalMs: 1000 },
        }),
        clock,
      );

      processor.onModuleInit();
      timed.onModuleInit();
      jest.advanceTimersByTime(1000);

      expect(purge).toHaveBeenCalledTimes(1);
      timed.onModuleDestroy();
    } finally {
      jest.useRealTimers();
    }
  });
});
