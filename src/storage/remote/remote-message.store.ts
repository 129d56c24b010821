import { Injectable, Logger } from '@nestjs/common';
import type { StorageBackend } from '../../config/configuration';
import {
  MediaInfo,
  MessageStore,
  StoreCapability,
  StoreMessageInput,
  StoreMessageOutcome,
  StoredMessage,
} from '../storage.contracts';
import {
  MediaInfoUnavailableError,
  UnsupportedByBackendError,
  describeError,
} from '../storage.errors';
import { ConversationResolverService } from './conversation-resolver.service';
import { MessageWriterService } from './message-writer.service';

/**
 * Write-side store backed by the Supabase REST API.
 *
 * Reads are not answered here: downstream tools query the remote store
 * directly, and media file metadata is not modelled as columns, only
 * folded into message metadata.
 */
@Injectable()
export class RemoteMessageStore implements MessageStore {
  readonly backend: StorageBackend = 'remote';
  readonly capabilities: ReadonlySet<StoreCapability> =
    new Set<StoreCapability>(['storeChat', 'storeMessage']);

  private readonly log = new Logger(RemoteMessageStore.name);

  constructor(
    private readonly resolver: ConversationResolverService,
    private readonly writer: MessageWriterService,
  ) {}

  async storeChat(
    jid: string,
    name: string,
    lastMessageTime: Date,
  ): Promise<void> {
    const conversationId = await this.resolver.resolve(jid, name);

    if (name) {
      try {
        await this.resolver.rename(jid, name);
      } catch (err) {
        this.log.warn(
          `[storeChat] Keeping old name for ${jid}: ${describeError(err)}`,
        );
      }
    }

    await this.resolver.touch(conversationId, lastMessageTime);
  }

  async storeMessage(input: StoreMessageInput): Promise<StoreMessageOutcome> {
    if (input.filename || input.url || input.fileLength) {
      this.log.debug(
        `[storeMessage] Media fields of ${input.id} not persisted remotely`,
      );
    }

    return this.writer.write({
      externalId: input.id,
      chatJid: input.chatJid,
      sender: input.sender,
      recipient: input.recipient || input.chatJid,
      content: input.content,
      timestamp: input.timestamp,
      isFromMe: input.isFromMe,
      mediaType: input.mediaType,
    });
  }

  async getMessages(
    _chatJid: string,
    _limit: number,
  ): Promise<StoredMessage[]> {
    throw new UnsupportedByBackendError('getMessages', this.backend);
  }

  async getChats(): Promise<Map<string, Date>> {
    throw new UnsupportedByBackendError('getChats', this.backend);
  }

  async getMediaInfo(id: string, chatJid: string): Promise<MediaInfo> {
    throw new MediaInfoUnavailableError(
      id,
      chatJid,
      'media info is not stored by the remote backend',
    );
  }

  async close(): Promise<void> {
    // Nothing held locally.
  }
}
