/**
 * Inbox NestJS Module
 */

// Main module
export { InboxModule, createStorageAdapter, combineHooks } from './inbox.module';

// Configuration
export {
  defaultInboxConfig,
  inboxConfigFromEnv,
  parseLogLevel,
  resolveInboxConfig,
  resolveLogLevels,
  DEFAULT_DATABASE_URL,
  DEFAULT_PORT,
} from './inbox.config';
export type {
  InboxModuleConfig,
  InboxModuleAsyncConfig,
  InboxStorageConfig,
  InboxLogLevel,
} from './inbox.config';

// Controllers
export * from './controllers';

// Services
export { MetricsService, LATENCY_BUCKETS_MS } from './services/metrics.service';
export { ConfigurationService } from './services/configuration.service';

// Middleware, interceptors, filters, pipes
export * from './middleware';
export { RawBodyInterceptor, extractRawBody } from './interceptors/raw-body.interceptor';
export {
  StorageUnavailableFilter,
  STORAGE_UNAVAILABLE_DETAIL,
} from './filters/storage-unavailable.filter';
export { createQueryValidationPipe } from './pipes/query-validation.pipe';

// Injection tokens
export * from './constants';
