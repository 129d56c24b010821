import { Injectable, Logger } from '@nestjs/common';
import {
  SupabaseRestClient,
  eqQuery,
  parseRows,
  rowId,
} from '../../supabase/supabase-rest.client';
import { RedisKeys, RedisService, RedisTTL } from '../../redis';
import { KeyedMutex } from '../../common/utils/keyed-mutex';
import { withRetry } from '../../common/utils/resilience';
import {
  ResolutionLockBusyError,
  StoreDomainError,
  atStage,
  describeError,
} from '../storage.errors';
import { ConversationCache } from './conversation-cache';
import { CHANNEL, ConversationRecord, INITIAL_STATUS } from './records';

/**
 * Maps a contact identifier to its conversation id, creating the
 * conversation on first contact.
 *
 * Lookup-then-create is not atomic on the store side, so every resolution
 * of a given contact runs under a per-key lock: in-process first, then a
 * Redis lock shared by every instance pointing at the same Redis.
 */
@Injectable()
export class ConversationResolverService {
  private readonly log = new Logger(ConversationResolverService.name);
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly rest: SupabaseRestClient,
    private readonly redis: RedisService,
    private readonly cache: ConversationCache,
  ) {}

  /**
   * Authoritative resolution: always asks the store, then refreshes the
   * cache with the answer.
   */
  async resolve(
    contactIdentifier: string,
    displayName?: string,
  ): Promise<string> {
    return this.serialized(contactIdentifier, () =>
      this.lookupOrCreate(contactIdentifier, displayName),
    );
  }

  /**
   * Cache-first resolution. A miss falls back to `resolve`; the cache is
   * checked again once the lock is held, so callers queued behind a
   * first-contact creation reuse its id.
   */
  async resolveCached(contactIdentifier: string): Promise<string> {
    const hit = this.cache.get(contactIdentifier);
    if (hit) return hit;

    return this.serialized(contactIdentifier, async () => {
      const settled = this.cache.get(contactIdentifier);
      if (settled) return settled;
      return this.lookupOrCreate(contactIdentifier);
    });
  }

  async rename(contactIdentifier: string, name: string): Promise<void> {
    const filter = eqQuery({
      contact_identifier: contactIdentifier,
      channel: CHANNEL,
    });
    await atStage(
      'update conversation name',
      this.rest.execute('PATCH', `conversations?${filter}`, {
        contact_name: name,
      }),
    );
  }

  async touch(conversationId: string, lastMessageAt: Date): Promise<void> {
    const filter = eqQuery({ id: conversationId });
    await atStage(
      'update conversation last_message_at',
      this.rest.execute('PATCH', `conversations?${filter}`, {
        last_message_at: lastMessageAt.toISOString(),
      }),
    );
  }

  /** Drops a cached id so the next resolution asks the store again. */
  forget(contactIdentifier: string): void {
    if (this.cache.delete(contactIdentifier)) {
      this.log.debug(
        `[forget] Evicted cached conversation for ${contactIdentifier}`,
      );
    }
  }

  private async lookupOrCreate(
    contactIdentifier: string,
    displayName?: string,
  ): Promise<string> {
    const filter = eqQuery(
      { contact_identifier: contactIdentifier, channel: CHANNEL },
      ['id'],
    );
    const found = await atStage(
      'query conversation',
      this.rest.execute('GET', `conversations?${filter}`),
    );
    const existing = parseRows(found, 'conversation').map(rowId).find(Boolean);
    if (existing) {
      this.cache.set(contactIdentifier, existing);
      return existing;
    }

    const conversation: ConversationRecord = {
      channel: CHANNEL,
      contact_identifier: contactIdentifier,
      ...(displayName ? { contact_name: displayName } : {}),
      status: INITIAL_STATUS,
    };
    const created = await atStage(
      'create conversation',
      this.rest.execute('POST', 'conversations', conversation),
    );
    const createdId = parseRows(created, 'new conversation')
      .map(rowId)
      .find(Boolean);
    if (!createdId) {
      throw new StoreDomainError('no conversation returned after creation');
    }

    this.log.log(
      `[resolve] Created conversation ${createdId} for ${contactIdentifier}`,
    );
    this.cache.set(contactIdentifier, createdId);
    return createdId;
  }

  private async serialized<T>(
    contactIdentifier: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    return this.mutex.withLock(contactIdentifier, async () => {
      const lockKey = RedisKeys.resolveLock(CHANNEL, contactIdentifier);
      const token = await this.acquire(lockKey);
      try {
        return await fn();
      } finally {
        await this.release(lockKey, token);
      }
    });
  }

  private async acquire(lockKey: string): Promise<string> {
    return withRetry(
      async () => {
        const token = await this.redis.acquireLock(
          lockKey,
          RedisTTL.RESOLVE_LOCK * 1000,
        );
        if (!token) throw new ResolutionLockBusyError(lockKey);
        return token;
      },
      {
        maxAttempts: 8,
        baseDelayMs: 50,
        maxDelayMs: 1000,
        shouldRetry: (err) => err instanceof ResolutionLockBusyError,
      },
    );
  }

  private async release(lockKey: string, token: string): Promise<void> {
    try {
      const released = await this.redis.releaseLock(lockKey, token);
      if (!released) {
        this.log.warn(
          `[release] ${lockKey} expired before resolution finished`,
        );
      }
    } catch (err) {
      // Expires on its own after RESOLVE_LOCK seconds.
      this.log.warn(
        `[release] Could not release ${lockKey}: ${describeError(err)}`,
      );
    }
  }
}
