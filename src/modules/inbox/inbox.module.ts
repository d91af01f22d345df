import {
  DynamicModule,
  Global,
  Inject,
  Logger,
  MiddlewareConsumer,
  Module,
  NestModule,
  OnApplicationShutdown,
  Provider,
} from '@nestjs/common';
import {
  InboxModuleConfig,
  InboxModuleAsyncConfig,
  InboxStorageConfig,
  resolveInboxConfig,
} from './inbox.config';
import {
  LifecycleHooks,
  MessageService,
  MessageStorageAdapter,
  WebhookProcessor,
} from '../../core';
import { InMemoryStorageAdapter } from '../../adapters/storage/memory';
import {
  TypeORMStorageAdapter,
  createDataSource,
} from '../../adapters/storage/typeorm';
import { INBOX_CONTROLLERS } from './controllers';
import { RequestLoggingMiddleware } from './middleware/request-logging.middleware';
import { MetricsService } from './services/metrics.service';
import { ConfigurationService } from './services/configuration.service';
import {
  INBOX_CONFIG,
  MESSAGE_SERVICE,
  STORAGE_ADAPTER,
  WEBHOOK_PROCESSOR,
} from './constants';

/**
 * Inbox Module - Main NestJS Module
 *
 * Wires the storage adapter, the ingestion pipeline and the read service
 * behind the HTTP controllers.
 */
@Global()
@Module({})
export class InboxModule implements NestModule, OnApplicationShutdown {
  private static readonly logger = new Logger(InboxModule.name);

  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: MessageStorageAdapter,
  ) {}

  /**
   * Configure the inbox synchronously
   */
  static forRoot(config: Partial<InboxModuleConfig> = {}): DynamicModule {
    return {
      module: InboxModule,
      providers: [
        {
          provide: INBOX_CONFIG,
          useValue: resolveInboxConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: INBOX_CONTROLLERS,
      exports: this.exportedTokens(),
    };
  }

  /**
   * Configure the inbox asynchronously
   */
  static forRootAsync(options: InboxModuleAsyncConfig): DynamicModule {
    return {
      module: InboxModule,
      imports: options.imports ?? [],
      providers: [
        {
          provide: INBOX_CONFIG,
          useFactory: async (...args: unknown[]) =>
            resolveInboxConfig(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        ...this.createProviders(),
      ],
      controllers: INBOX_CONTROLLERS,
      exports: this.exportedTokens(),
    };
  }

  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestLoggingMiddleware).forRoutes(...INBOX_CONTROLLERS);
  }

  async onApplicationShutdown(): Promise<void> {
    await this.storageAdapter.close();
  }

  /**
   * Providers shared by forRoot and forRootAsync; all read INBOX_CONFIG
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: STORAGE_ADAPTER,
        useFactory: (config: InboxModuleConfig) =>
          createStorageAdapter(config.storage),
        inject: [INBOX_CONFIG],
      },
      MetricsService,
      ConfigurationService,
      {
        provide: WEBHOOK_PROCESSOR,
        useFactory: (
          config: InboxModuleConfig,
          storageAdapter: MessageStorageAdapter,
          metrics: MetricsService,
        ) => {
          if (!config.webhookSecret) {
            this.logger.warn(
              'No webhook secret configured; every webhook will be rejected',
            );
          }

          return new WebhookProcessor({
            storageAdapter,
            secret: config.webhookSecret,
            signatureHeader: config.signatureHeader,
            hooks: combineHooks(metrics.lifecycleHooks(), config.hooks),
          });
        },
        inject: [INBOX_CONFIG, STORAGE_ADAPTER, MetricsService],
      },
      {
        provide: MESSAGE_SERVICE,
        useFactory: (storageAdapter: MessageStorageAdapter) =>
          new MessageService(storageAdapter),
        inject: [STORAGE_ADAPTER],
      },
    ];
  }

  private static exportedTokens(): Array<symbol | typeof MetricsService> {
    return [
      INBOX_CONFIG,
      STORAGE_ADAPTER,
      WEBHOOK_PROCESSOR,
      MESSAGE_SERVICE,
      MetricsService,
    ];
  }
}

/**
 * Build the storage adapter named by the configuration
 */
export async function createStorageAdapter(
  storage: InboxStorageConfig,
): Promise<MessageStorageAdapter> {
  switch (storage.type) {
    case 'memory':
      return new InMemoryStorageAdapter();

    case 'typeorm': {
      const dataSource = createDataSource(storage.databaseUrl, {
        logging: storage.logging,
      });
      await dataSource.initialize();
      return new TypeORMStorageAdapter(dataSource);
    }

    case 'custom':
      return storage.adapter;
  }
}

/**
 * Run several hook sets in order
 */
export function combineHooks(
  ...sets: Array<LifecycleHooks | undefined>
): LifecycleHooks {
  const defined = sets.filter((set): set is LifecycleHooks => set !== undefined);

  return {
    onWebhookOutcome: async (event) => {
      for (const hooks of defined) {
        await hooks.onWebhookOutcome?.(event);
      }
    },
    onError: async (error, context) => {
      for (const hooks of defined) {
        await hooks.onError?.(error, context);
      }
    },
  };
}
