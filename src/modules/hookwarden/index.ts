/**
 * Hookwarden NestJS Module
 */

// Main module
export { HookwardenModule } from './hookwarden.module';

// Configuration
export type { HookwardenModuleConfig, HookwardenModuleAsyncConfig } from './hookwarden.config';
export { defaultHookwardenConfig, mergeHookwardenConfig } from './hookwarden.config';
export {
  EnvironmentVariables,
  validateEnvironment,
  hookwardenConfigFromEnvironment,
  parseSecrets,
} from './config/environment.validation';

// Injection tokens
export * from './constants';

// Controllers
export { WebhookController } from './controllers/webhook.controller';
export { HealthController } from './controllers/health.controller';

// Services
export { HookwardenService } from './services/hookwarden.service';
export { RetentionProcessor } from './services/retention.processor';

// Interceptors
export { RawBodyInterceptor, BODY_UNAVAILABLE } from './interceptors/raw-body.interceptor';
