import { Controller, Get, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { MetricsService } from '../services/metrics.service';
import { ApiMetricsExposition } from '../../../_shared/swagger/decorators';

@ApiTags('Health')
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  @Get()
  @ApiMetricsExposition()
  async scrape(
    @Res({ passthrough: true }) res: Pick<Response, 'setHeader'>,
  ): Promise<string> {
    res.setHeader('Content-Type', this.metrics.contentType);
    return this.metrics.exposition();
  }
}
