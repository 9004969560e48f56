import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  EnvironmentVariables,
  HookwardenModule,
  hookwardenConfigFromEnvironment,
  validateEnvironment,
} from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    HookwardenModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) => {
        return hookwardenConfigFromEnvironment({
          WEBHOOK_SECRETS: configService.get('WEBHOOK_SECRETS', { infer: true }),
          WEBHOOK_SIGNATURE_HEADER: configService.get('WEBHOOK_SIGNATURE_HEADER', { infer: true }),
          WEBHOOK_TOLERANCE_SECONDS: configService.get('WEBHOOK_TOLERANCE_SECONDS', { infer: true }),
          WEBHOOK_STALE_PROCESSING_SECONDS: configService.get('WEBHOOK_STALE_PROCESSING_SECONDS', {
            infer: true,
          }),
          WEBHOOK_RETENTION_DAYS: configService.get('WEBHOOK_RETENTION_DAYS', { infer: true }),
          WEBHOOK_RETENTION_AUTO_CLEANUP: configService.get('WEBHOOK_RETENTION_AUTO_CLEANUP', {
            infer: true,
          }),
          WEBHOOK_PROCESSING_MODE: configService.get('WEBHOOK_PROCESSING_MODE', { infer: true }),
          STORAGE_TYPE: configService.get('STORAGE_TYPE', { infer: true }),
          PORT: configService.get('PORT', { infer: true }),
        });
      },
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
