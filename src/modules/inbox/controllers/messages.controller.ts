import { Controller, Get, Inject, Query, UseFilters } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { MessageListView, MessageService } from '../../../core';
import { ApiListMessages, ListMessagesQueryDto } from '../../../_shared';
import { StorageUnavailableFilter } from '../filters/storage-unavailable.filter';
import { createQueryValidationPipe } from '../pipes/query-validation.pipe';
import { MESSAGE_SERVICE } from '../constants';

@ApiTags('Query')
@Controller('messages')
@UseFilters(StorageUnavailableFilter)
export class MessagesController {
  constructor(
    @Inject(MESSAGE_SERVICE)
    private readonly messageService: MessageService,
  ) {}

  @Get()
  @ApiListMessages()
  async listMessages(
    @Query(createQueryValidationPipe()) query: ListMessagesQueryDto,
  ): Promise<MessageListView> {
    return this.messageService.listMessages(query);
  }
}
