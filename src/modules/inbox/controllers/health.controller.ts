import {
  Controller,
  Get,
  Inject,
  HttpStatus,
  HttpCode,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { MessageStorageAdapter } from '../../../core';
import { STORAGE_ADAPTER } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import { STORAGE_UNAVAILABLE_DETAIL } from '../filters/storage-unavailable.filter';
import {
  ApiLivenessCheck,
  ApiReadinessCheck,
} from '../../../_shared/swagger/decorators';

export const SECRET_MISSING_DETAIL = 'WEBHOOK_SECRET not configured';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: MessageStorageAdapter,
    private readonly configuration: ConfigurationService,
  ) {}

  @Get('live')
  @HttpCode(HttpStatus.OK)
  @ApiLivenessCheck()
  live(): { status: 'ok' } {
    return { status: 'ok' };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<{ status: 'ready' }> {
    if (!this.configuration.isSecretConfigured()) {
      this.logger.warn(`Not ready: ${SECRET_MISSING_DETAIL}`);
      throw new ServiceUnavailableException({ detail: SECRET_MISSING_DETAIL });
    }

    if (!(await this.storageAdapter.isHealthy())) {
      this.logger.warn(`Not ready: ${STORAGE_UNAVAILABLE_DETAIL}`);
      throw new ServiceUnavailableException({
        detail: STORAGE_UNAVAILABLE_DETAIL,
      });
    }

    return { status: 'ready' };
  }
}
