import type { InjectionToken, LogLevel, ModuleMetadata } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';
import { LifecycleHooks, MessageStorageAdapter, SIGNATURE_HEADER } from '../../core';

export const DEFAULT_DATABASE_URL = 'sqlite:///data/app.db';
export const DEFAULT_PORT = 8000;

export type InboxLogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Where messages are stored
 */
export type InboxStorageConfig =
  | {
      type: 'typeorm';
      /**
       * sqlite:///<path>, sqlite::memory: or postgres://...
       */
      databaseUrl: string;
      logging?: boolean;
    }
  | { type: 'memory' }
  | { type: 'custom'; adapter: MessageStorageAdapter };

/**
 * Inbox Module Configuration
 */
export interface InboxModuleConfig {
  /**
   * Shared HMAC secret. Without it every webhook is rejected and the
   * readiness probe fails.
   */
  webhookSecret?: string;

  /**
   * Header carrying the hex signature
   */
  signatureHeader?: string;

  storage: InboxStorageConfig;

  /**
   * Extra lifecycle hooks, called after the built-in metrics hooks
   */
  hooks?: LifecycleHooks;

  logLevel?: InboxLogLevel;
}

/**
 * Async configuration factory
 */
export interface InboxModuleAsyncConfig extends Pick<ModuleMetadata, 'imports'> {
  inject?: InjectionToken[];
  useFactory(
    ...args: unknown[]
  ): Promise<InboxModuleConfig> | InboxModuleConfig;
}

/**
 * Default configuration values
 */
export const defaultInboxConfig: InboxModuleConfig = {
  signatureHeader: SIGNATURE_HEADER,
  storage: { type: 'typeorm', databaseUrl: DEFAULT_DATABASE_URL },
  logLevel: 'INFO',
};

export function resolveInboxConfig(config: Partial<InboxModuleConfig>): InboxModuleConfig {
  return {
    ...defaultInboxConfig,
    ...config,
    storage: config.storage ?? defaultInboxConfig.storage,
  };
}

/**
 * Build the module configuration from environment variables
 */
export function inboxConfigFromEnv(config: ConfigService): InboxModuleConfig {
  const secret = config.get<string>('WEBHOOK_SECRET');

  return resolveInboxConfig({
    webhookSecret: secret ? secret : undefined,
    storage: {
      type: 'typeorm',
      databaseUrl: config.get<string>('DATABASE_URL') ?? DEFAULT_DATABASE_URL,
    },
    logLevel: parseLogLevel(config.get<string>('LOG_LEVEL')),
  });
}

export function parseLogLevel(value: string | undefined): InboxLogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return 'DEBUG';
    case 'WARNING':
    case 'WARN':
      return 'WARNING';
    case 'ERROR':
      return 'ERROR';
    default:
      return 'INFO';
  }
}

/**
 * Nest log levels enabled at a given threshold
 */
export function resolveLogLevels(level: InboxLogLevel): LogLevel[] {
  switch (level) {
    case 'DEBUG':
      return ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];
    case 'INFO':
      return ['fatal', 'error', 'warn', 'log'];
    case 'WARNING':
      return ['fatal', 'error', 'warn'];
    case 'ERROR':
      return ['fatal', 'error'];
  }
}
