import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { randomUUID } from 'crypto';
import { isEnabled } from '../config/configuration';

// Deletes the key only if it still holds the caller's token.
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

/**
 * Redis service with in-memory fallback for a single instance.
 * GUARD: If MULTI_INSTANCE=true and Redis unavailable, operations fail hard.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private readonly fallbackCache = new Map<
    string,
    { value: string; expiresAt: number }
  >();
  private readonly fallbackLocks = new Map<
    string,
    { token: string; expiresAt: number }
  >();
  private readonly multiInstance: boolean;
  private connected = false;

  constructor(private readonly config: ConfigService) {
    this.multiInstance = isEnabled(config.get<string>('MULTI_INSTANCE'));
    this.initializeClient();
  }

  private initializeClient() {
    const redisUrl = this.config.get<string>('REDIS_URL');

    if (!redisUrl) {
      this.logger.warn('REDIS_URL not configured, using in-memory fallback');
      return;
    }

    try {
      this.client = new Redis(redisUrl, {
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => {
          if (times > 3) return null;
          return Math.min(times * 100, 2000);
        },
        lazyConnect: true,
      });

      this.client.on('connect', () => {
        this.connected = true;
        this.logger.log('Redis connected');
      });

      this.client.on('error', (err: Error) => {
        this.connected = false;
        this.logger.error('Redis error', err.message);
      });

      this.client.on('close', () => {
        this.connected = false;
        this.logger.warn('Redis connection closed');
      });

      this.client.connect().catch((err: Error) => {
        this.logger.error('Failed to connect to Redis', err.message);
      });
    } catch (err) {
      this.logger.error('Failed to initialize Redis client', err);
    }
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
    }
  }

  /**
   * Returns the live client, null for the in-memory fallback.
   * Throws in multi-instance mode, where the fallback would be unsafe.
   */
  private available(): Redis | null {
    if (this.connected && this.client) {
      return this.client;
    }
    if (this.multiInstance) {
      throw new Error('Redis unavailable in multi-instance mode');
    }
    return null;
  }

  /**
   * Set value with TTL (seconds)
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = this.available();
    if (client) {
      await client.setex(key, ttlSeconds, value);
      return;
    }

    this.fallbackCache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  /**
   * Sets the key only when it does not exist yet.
   * Returns true when this call created it.
   */
  async setIfAbsent(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<boolean> {
    const client = this.available();
    if (client) {
      const result = await client.set(key, value, 'EX', ttlSeconds, 'NX');
      return result === 'OK';
    }

    const entry = this.fallbackCache.get(key);
    if (entry && entry.expiresAt > Date.now()) {
      return false;
    }
    this.fallbackCache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
    return true;
  }

  async del(key: string): Promise<void> {
    const client = this.available();
    if (client) {
      await client.del(key);
      return;
    }

    this.fallbackCache.delete(key);
  }

  /**
   * Acquire a distributed lock with TTL.
   * Returns the owner token when acquired, null if already held.
   */
  async acquireLock(key: string, ttlMs: number): Promise<string | null> {
    const token = randomUUID();
    const ttlSeconds = Math.ceil(ttlMs / 1000);

    const client = this.available();
    if (client) {
      const result = await client.set(key, token, 'EX', ttlSeconds, 'NX');
      return result === 'OK' ? token : null;
    }

    const existing = this.fallbackLocks.get(key);
    if (existing && existing.expiresAt > Date.now()) {
      return null;
    }
    this.fallbackLocks.set(key, { token, expiresAt: Date.now() + ttlMs });
    return token;
  }

  /**
   * Releases the lock only while `token` still owns it; a lock that
   * expired and was taken by another holder is left alone.
   */
  async releaseLock(key: string, token: string): Promise<boolean> {
    const client = this.available();
    if (client) {
      const removed = await client.eval(RELEASE_LOCK_SCRIPT, 1, key, token);
      return removed === 1;
    }

    const existing = this.fallbackLocks.get(key);
    if (!existing || existing.token !== token) {
      return false;
    }
    this.fallbackLocks.delete(key);
    return true;
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client || !this.connected) {
      return !this.multiInstance; // Healthy in single-instance fallback mode
    }

    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch {
      return !this.multiInstance;
    }
  }

  getStatus(): { connected: boolean; mode: 'redis' | 'fallback' } {
    return {
      connected: this.connected,
      mode: this.connected && this.client ? 'redis' : 'fallback',
    };
  }
}
