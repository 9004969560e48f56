import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { DataSourceOptions } from 'typeorm';
import {
  Clock,
  DeduplicationConfig,
  EventHandler,
  LifecycleHooks,
  ProcessingMode,
  ProcessingStore,
  RetentionConfig,
  VerificationConfig,
} from '../../core';

/**
 * Hookwarden Module Configuration
 */
export interface HookwardenModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'memory' | 'typeorm' | 'custom';
    options?: DataSourceOptions;
    store?: ProcessingStore;
  };

  /**
   * Signature verification: secrets (rotation supported), timestamp
   * tolerance and header name
   */
  verification: VerificationConfig;

  deduplication?: DeduplicationConfig;

  retention?: RetentionConfig;

  /**
   * `inline` (default) or `deferred` fast acknowledgement
   */
  processingMode?: ProcessingMode;

  /**
   * Routes registered at startup, in order
   */
  handlers?: Array<{
    pattern: string;
    handler: EventHandler;
    name?: string;
  }>;

  /**
   * Lifecycle hooks
   */
  hooks?: LifecycleHooks;

  /**
   * Time source, replaced in tests
   */
  clock?: Clock;
}

/**
 * Async configuration factory
 */
export interface HookwardenModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    HookwardenModuleConfig | Promise<HookwardenModuleConfig>
  >['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultHookwardenConfig = {
  deduplication: {
    staleProcessingSeconds: 60,
  },
  retention: {
    retentionDays: 30,
    autoCleanup: false,
    cleanupIntervalMs: 60 * 60 * 1000,
  },
  processingMode: 'inline',
} satisfies Partial<HookwardenModuleConfig>;

/**
 * Apply defaults section by section
 */
export function mergeHookwardenConfig(
  config: HookwardenModuleConfig,
): HookwardenModuleConfig {
  return {
    ...config,
    deduplication: {
      ...defaultHookwardenConfig.deduplication,
      ...config.deduplication,
    },
    retention: {
      ...defaultHookwardenConfig.retention,
      ...config.retention,
    },
    processingMode: config.processingMode ?? defaultHookwardenConfig.processingMode,
  };
}
