import {
  DynamicModule,
  Global,
  Inject,
  Logger,
  Module,
  OnModuleDestroy,
  Provider,
} from '@nestjs/common';
import {
  HookwardenModuleConfig,
  HookwardenModuleAsyncConfig,
  mergeHookwardenConfig,
} from './hookwarden.config';
import {
  Clock,
  EventRouter,
  ProcessingStore,
  WebhookProcessor,
  systemClock,
} from '../../core';
import { MemoryProcessingStore } from '../../adapters/storage/memory';
import {
  TypeORMProcessingStore,
  createDataSource,
} from '../../adapters/storage/typeorm';
import { WebhookController } from './controllers/webhook.controller';
import { HealthController } from './controllers/health.controller';
import { HookwardenService } from './services/hookwarden.service';
import { RetentionProcessor } from './services/retention.processor';
import {
  CLOCK,
  EVENT_ROUTER,
  HOOKWARDEN_CONFIG,
  PROCESSING_STORE,
  WEBHOOK_PROCESSOR,
} from './constants';

const logger = new Logger('HookwardenModule');

/**
 * Hookwarden Module - Main NestJS Module
 *
 * Wires the processing store, router and pipeline behind injection tokens
 * and mounts the webhook and health controllers
 */
@Global()
@Module({})
export class HookwardenModule implements OnModuleDestroy {
  constructor(
    @Inject(HOOKWARDEN_CONFIG)
    private readonly config: HookwardenModuleConfig,
    @Inject(PROCESSING_STORE)
    private readonly store: ProcessingStore,
  ) {}

  /**
   * Close the connection this module opened. Custom stores belong to the caller.
   */
  async onModuleDestroy(): Promise<void> {
    if (
      this.config.storage.type === 'typeorm' &&
      this.store instanceof TypeORMProcessingStore
    ) {
      await this.store.close();
      logger.log('Processing store connection closed');
    }
  }

  /**
   * Configure Hookwarden synchronously
   */
  static forRoot(config: HookwardenModuleConfig): DynamicModule {
    return {
      module: HookwardenModule,
      providers: [
        {
          provide: HOOKWARDEN_CONFIG,
          useValue: mergeHookwardenConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: this.exportedTokens(),
    };
  }

  /**
   * Configure Hookwarden asynchronously
   */
  static forRootAsync(options: HookwardenModuleAsyncConfig): DynamicModule {
    return {
      module: HookwardenModule,
      imports: options.imports || [],
      providers: [
        {
          provide: HOOKWARDEN_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeHookwardenConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: this.exportedTokens(),
    };
  }

  private static exportedTokens() {
    return [
      HOOKWARDEN_CONFIG,
      PROCESSING_STORE,
      EVENT_ROUTER,
      WEBHOOK_PROCESSOR,
      HookwardenService,
    ];
  }

  /**
   * Providers derived from the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: CLOCK,
        useFactory: (config: HookwardenModuleConfig): Clock =>
          config.clock ?? systemClock,
        inject: [HOOKWARDEN_CONFIG],
      },
      {
        provide: PROCESSING_STORE,
        useFactory: (config: HookwardenModuleConfig) => this.createStore(config),
        inject: [HOOKWARDEN_CONFIG],
      },
      {
        provide: EVENT_ROUTER,
        useFactory: (config: HookwardenModuleConfig): EventRouter => {
          const router = new EventRouter();
          for (const { pattern, handler, name } of config.handlers ?? []) {
            router.on(pattern, handler, name);
          }
          return router;
        },
        inject: [HOOKWARDEN_CONFIG],
      },
      {
        provide: WEBHOOK_PROCESSOR,
        useFactory: (
          config: HookwardenModuleConfig,
          store: ProcessingStore,
          router: EventRouter,
          clock: Clock,
        ): WebhookProcessor =>
          new WebhookProcessor({
            store,
            router,
            verification: config.verification,
            deduplication: config.deduplication,
            processingMode: config.processingMode,
            hooks: config.hooks,
            clock,
          }),
        inject: [HOOKWARDEN_CONFIG, PROCESSING_STORE, EVENT_ROUTER, CLOCK],
      },
      HookwardenService,
      RetentionProcessor,
    ];
  }

  private static async createStore(
    config: HookwardenModuleConfig,
  ): Promise<ProcessingStore> {
    switch (config.storage.type) {
      case 'memory':
        return new MemoryProcessingStore();

      case 'typeorm': {
        const dataSource = createDataSource(config.storage.options);
        await dataSource.initialize();
        logger.log(`Processing store connected (${dataSource.options.type})`);
        return new TypeORMProcessingStore(dataSource);
      }

      case 'custom':
        if (!config.storage.store) {
          throw new Error('Custom processing store not provided');
        }
        return config.storage.store;
    }
  }
}
