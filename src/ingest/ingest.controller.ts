import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { RedisService } from '../redis';
import {
  StoreMessageOutcome,
  StoredMessage,
} from '../storage/storage.contracts';
import { ChatEventDto } from './dto/chat-event.dto';
import { MessageEventDto } from './dto/message-event.dto';
import { MessagesQueryDto } from './dto/messages-query.dto';
import { IngestService } from './ingest.service';
import { toHttpException } from './store-error.mapper';

@Controller()
export class IngestController {
  private readonly log = new Logger(IngestController.name);

  constructor(
    private readonly ingest: IngestService,
    private readonly redis: RedisService,
  ) {}

  @Post('events/chat')
  @HttpCode(HttpStatus.ACCEPTED)
  async chat(@Body() body: ChatEventDto): Promise<{ status: 'stored' }> {
    try {
      await this.ingest.ingestChat(body);
      return { status: 'stored' };
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Post('events/message')
  @HttpCode(HttpStatus.ACCEPTED)
  async message(
    @Body() body: MessageEventDto,
  ): Promise<{ status: StoreMessageOutcome }> {
    try {
      const status = await this.ingest.ingestMessage(body);
      return { status };
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Get('chats')
  async chats(): Promise<Array<{ jid: string; lastMessageTime: string }>> {
    try {
      return await this.ingest.listChats();
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Get('chats/:jid/messages')
  async messages(
    @Param('jid') jid: string,
    @Query() query: MessagesQueryDto,
  ): Promise<StoredMessage[]> {
    try {
      return await this.ingest.listMessages(jid, query.limit ?? 20);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Get('chats/:jid/messages/:id/media')
  async media(@Param('jid') jid: string, @Param('id') id: string) {
    try {
      const info = await this.ingest.mediaInfo(id, jid);
      return {
        mediaType: info.mediaType,
        filename: info.filename,
        url: info.url,
        mediaKey: info.mediaKey?.toString('base64') ?? null,
        fileSha256: info.fileSha256?.toString('base64') ?? null,
        fileEncSha256: info.fileEncSha256?.toString('base64') ?? null,
        fileLength: info.fileLength,
      };
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Get('health')
  async health() {
    const healthy = await this.redis.isHealthy();
    const { mode } = this.redis.getStatus();
    if (!healthy) {
      this.log.warn(`[health] Redis down (mode=${mode})`);
    }

    return {
      status: healthy ? 'up' : 'degraded',
      backend: this.ingest.backend,
      capabilities: [...this.ingest.capabilities],
      redis: { status: healthy ? 'up' : 'down', mode },
    };
  }
}
