import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SupabaseRestClient } from '../../supabase/supabase-rest.client';
import { RedisKeys, RedisService, RedisTTL } from '../../redis';
import { isEnabled } from '../../config/configuration';
import { StoreMessageOutcome, isEmptyMessage } from '../storage.contracts';
import { StoreApiError, atStage, describeError } from '../storage.errors';
import { ConversationResolverService } from './conversation-resolver.service';
import { CHANNEL, MessageRecord, directionOf } from './records';

export interface MessageWrite {
  /** Messaging client's native id; stored as external_id when non-empty. */
  externalId: string;
  chatJid: string;
  sender: string;
  recipient: string;
  content: string;
  timestamp: Date;
  isFromMe: boolean;
  mediaType?: string;
}

/**
 * Persists one message row and refreshes its conversation.
 *
 * The message insert is the primary effect and its failure propagates.
 * The conversation `last_message_at` refresh afterwards is best-effort:
 * a failure is logged and the call still succeeds.
 */
@Injectable()
export class MessageWriterService {
  private readonly log = new Logger(MessageWriterService.name);
  private readonly dedupEnabled: boolean;

  constructor(
    private readonly rest: SupabaseRestClient,
    private readonly resolver: ConversationResolverService,
    private readonly redis: RedisService,
    cfg: ConfigService,
  ) {
    this.dedupEnabled = isEnabled(cfg.get<string>('DEDUP_EXTERNAL_IDS'));
  }

  async write(msg: MessageWrite): Promise<StoreMessageOutcome> {
    if (isEmptyMessage(msg.content, msg.mediaType)) {
      this.log.debug(
        `[write] Skipping empty message ${msg.externalId || '(no id)'}`,
      );
      return 'skipped';
    }

    const conversationId = await this.resolver.resolveCached(msg.chatJid);

    const dedupKey =
      this.dedupEnabled && msg.externalId
        ? RedisKeys.msgDedup(CHANNEL, msg.externalId)
        : null;
    if (dedupKey) {
      const claimed = await this.redis.setIfAbsent(
        dedupKey,
        'processing',
        RedisTTL.MSG_DEDUP_PROCESSING,
      );
      if (!claimed) {
        this.log.debug(
          `[write] Duplicate external id ${msg.externalId} ignored`,
        );
        return 'duplicate';
      }
    }

    const record = this.toRecord(conversationId, msg);
    try {
      await atStage(
        'store message',
        this.rest.execute('POST', 'messages', record),
      );
    } catch (err) {
      if (dedupKey) await this.releaseClaim(dedupKey);
      // The cached conversation may have been removed on the store side.
      if (err instanceof StoreApiError && err.status === 409) {
        this.resolver.forget(msg.chatJid);
      }
      throw err;
    }

    if (dedupKey) {
      await this.redis.set(dedupKey, 'done', RedisTTL.MSG_DEDUP_DONE);
    }

    try {
      await this.resolver.touch(conversationId, msg.timestamp);
    } catch (err) {
      this.log.warn(
        `[write] Stored message ${msg.externalId || '(no id)'} but ` +
          `${describeError(err)} (conversation ${conversationId})`,
      );
    }

    return 'stored';
  }

  // The insert failure is what the caller sees; the claim expires anyway.
  private async releaseClaim(dedupKey: string): Promise<void> {
    try {
      await this.redis.del(dedupKey);
    } catch (err) {
      this.log.warn(
        `[write] Could not release dedup claim ${dedupKey}: ` +
          describeError(err),
      );
    }
  }

  private toRecord(conversationId: string, msg: MessageWrite): MessageRecord {
    const record: MessageRecord = {
      conversation_id: conversationId,
      channel: CHANNEL,
      direction: directionOf(msg.isFromMe),
      sender: msg.sender,
      recipient: msg.recipient,
    };
    if (msg.content) record.body = msg.content;
    if (msg.externalId) record.external_id = msg.externalId;
    if (msg.mediaType) record.metadata = { media_type: msg.mediaType };
    return record;
  }
}
