import { Injectable, Inject } from '@nestjs/common';
import type { InboxModuleConfig } from '../inbox.config';
import { INBOX_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Read access to the resolved inbox configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(INBOX_CONFIG)
    private readonly config: InboxModuleConfig,
  ) {}

  getConfig(): InboxModuleConfig {
    return this.config;
  }

  isSecretConfigured(): boolean {
    return Boolean(this.config.webhookSecret);
  }
}
