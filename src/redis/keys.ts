/**
 * Centralized Redis key patterns.
 * All keys and TTLs defined here for consistency.
 */
export const RedisKeys = {
  // Serializes conversation resolution per identity key
  resolveLock: (channel: string, contactIdentifier: string) =>
    `lock:resolve:${channel}:${contactIdentifier}`,

  // External message id dedup
  msgDedup: (channel: string, externalId: string) =>
    `msg:${channel}:${externalId}`,
};

/**
 * TTL constants in seconds
 */
export const RedisTTL = {
  RESOLVE_LOCK: 75, // lookup + create, two store round-trips of up to 30s each
  MSG_DEDUP_PROCESSING: 120, // 2 minutes (short TTL for crash recovery)
  MSG_DEDUP_DONE: 24 * 3600, // 24 hours (final state)
};
