import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import type { ProcessingMode } from '../../../core';
import type { HookwardenModuleConfig } from '../hookwarden.config';

const PROCESSING_MODES: ProcessingMode[] = ['inline', 'deferred'];
const STORAGE_TYPES = ['memory', 'typeorm'] as const;

/**
 * Environment variables read at startup
 */
export class EnvironmentVariables {
  /**
   * Comma separated signing secrets; more than one during rotation
   */
  @IsString()
  @IsNotEmpty()
  WEBHOOK_SECRETS!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  WEBHOOK_SIGNATURE_HEADER?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  WEBHOOK_TOLERANCE_SECONDS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  WEBHOOK_STALE_PROCESSING_SECONDS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  WEBHOOK_RETENTION_DAYS?: number;

  @IsOptional()
  @Transform(({ value }) => value === 'true' || value === true)
  @IsBoolean()
  WEBHOOK_RETENTION_AUTO_CLEANUP?: boolean;

  @IsOptional()
  @IsIn(PROCESSING_MODES)
  WEBHOOK_PROCESSING_MODE?: ProcessingMode;

  @IsOptional()
  @IsIn(STORAGE_TYPES)
  STORAGE_TYPE?: (typeof STORAGE_TYPES)[number];

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;
}

/**
 * `validate` hook for ConfigModule.forRoot
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: false,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map(
        (error) =>
          `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`,
      )
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}

/**
 * Module configuration from validated environment variables
 */
export function hookwardenConfigFromEnvironment(
  env: EnvironmentVariables,
): HookwardenModuleConfig {
  return {
    storage: { type: env.STORAGE_TYPE ?? 'memory' },
    verification: {
      secrets: parseSecrets(env.WEBHOOK_SECRETS),
      signatureHeader: env.WEBHOOK_SIGNATURE_HEADER,
      toleranceSeconds: env.WEBHOOK_TOLERANCE_SECONDS,
    },
    deduplication: {
      staleProcessingSeconds: env.WEBHOOK_STALE_PROCESSING_SECONDS,
    },
    retention: {
      retentionDays: env.WEBHOOK_RETENTION_DAYS,
      autoCleanup: env.WEBHOOK_RETENTION_AUTO_CLEANUP,
    },
    processingMode: env.WEBHOOK_PROCESSING_MODE,
  };
}

export function parseSecrets(value: string): string[] {
  return value
    .split(',')
    .map((secret) => secret.trim())
    .filter((secret) => secret.length > 0);
}
