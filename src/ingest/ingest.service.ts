import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  MESSAGE_STORE,
  MediaInfo,
  MessageStore,
  StoreMessageOutcome,
  StoredMessage,
} from '../storage/storage.contracts';
import { describeError } from '../storage/storage.errors';
import { debugLog } from '../common/utils/debug-logger';
import { ChatEventDto } from './dto/chat-event.dto';
import { MessageEventDto } from './dto/message-event.dto';

/**
 * Hands validated chat events to whichever store is active, with one
 * correlation id per event in the flow log.
 */
@Injectable()
export class IngestService {
  private readonly log = debugLog.ingest;

  constructor(@Inject(MESSAGE_STORE) private readonly store: MessageStore) {}

  get backend(): MessageStore['backend'] {
    return this.store.backend;
  }

  get capabilities(): MessageStore['capabilities'] {
    return this.store.capabilities;
  }

  async ingestChat(event: ChatEventDto): Promise<void> {
    const cid = this.correlationId();
    this.log.recv('chat event', { jid: event.jid, name: event.name }, cid);
    const lastMessageTime = toDate(event.lastMessageTime, 'lastMessageTime');
    const done = this.log.timer('storeChat', cid);

    try {
      await this.store.storeChat(event.jid, event.name ?? '', lastMessageTime);
      this.log.ok(
        'chat stored',
        { jid: event.jid, backend: this.store.backend },
        cid,
      );
      this.log.send('accepted', { status: 'stored' }, cid);
    } catch (err) {
      this.log.err(
        'chat not stored',
        { jid: event.jid, error: describeError(err) },
        cid,
      );
      throw err;
    } finally {
      done();
    }
  }

  async ingestMessage(event: MessageEventDto): Promise<StoreMessageOutcome> {
    const cid = this.correlationId();
    this.log.recv(
      'message event',
      {
        id: event.id,
        chat: event.chatJid,
        fromMe: event.isFromMe,
        media: event.mediaType,
      },
      cid,
    );
    const timestamp = toDate(event.timestamp, 'timestamp');
    const done = this.log.timer('storeMessage', cid);

    try {
      const outcome = await this.store.storeMessage({
        id: event.id,
        chatJid: event.chatJid,
        sender: event.sender,
        recipient: event.recipient,
        content: event.content ?? '',
        timestamp,
        isFromMe: event.isFromMe,
        mediaType: event.mediaType,
        filename: event.filename,
        url: event.url,
        mediaKey: fromBase64(event.mediaKey),
        fileSha256: fromBase64(event.fileSha256),
        fileEncSha256: fromBase64(event.fileEncSha256),
        fileLength: event.fileLength,
      });
      this.log.state(
        `message ${outcome}`,
        { id: event.id, chat: event.chatJid },
        cid,
      );
      this.log.send('accepted', { status: outcome }, cid);
      return outcome;
    } catch (err) {
      this.log.err(
        'message not stored',
        { id: event.id, error: describeError(err) },
        cid,
      );
      throw err;
    } finally {
      done();
    }
  }

  async listChats(): Promise<Array<{ jid: string; lastMessageTime: string }>> {
    const chats = await this.store.getChats();
    return [...chats.entries()].map(([jid, at]) => ({
      jid,
      lastMessageTime: at.toISOString(),
    }));
  }

  async listMessages(chatJid: string, limit: number): Promise<StoredMessage[]> {
    return this.store.getMessages(chatJid, limit);
  }

  async mediaInfo(id: string, chatJid: string): Promise<MediaInfo> {
    return this.store.getMediaInfo(id, chatJid);
  }

  private correlationId(): string {
    return randomUUID().slice(0, 8);
  }
}

/** Events whose time does not parse are rejected before reaching a store. */
function toDate(value: string, field: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new BadRequestException(
      `${field} is not a valid date-time: ${value}`,
    );
  }
  return date;
}

function fromBase64(value: string | undefined): Buffer | undefined {
  return value === undefined ? undefined : Buffer.from(value, 'base64');
}
