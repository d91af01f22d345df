import { Controller, Get, Inject, UseFilters } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { MessageService, MessageStatsView } from '../../../core';
import { ApiMessageStatistics } from '../../../_shared';
import { StorageUnavailableFilter } from '../filters/storage-unavailable.filter';
import { MESSAGE_SERVICE } from '../constants';

@ApiTags('Query')
@Controller('stats')
@UseFilters(StorageUnavailableFilter)
export class StatsController {
  constructor(
    @Inject(MESSAGE_SERVICE)
    private readonly messageService: MessageService,
  ) {}

  @Get()
  @ApiMessageStatistics()
  async getStats(): Promise<MessageStatsView> {
    return this.messageService.getStats();
  }
}
