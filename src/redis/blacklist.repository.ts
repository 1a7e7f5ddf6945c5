import { RedisClient } from './client';
import { RedisOperationResult, RedisRevokedEntry, RevocationKind } from '@/types/redis.types';
import { TOKEN_CONFIG } from '@/config/constants';

/**
 * Revoked token ids and token families. Entries expire with the token they
 * revoke, so the store only ever holds tokens that could still verify.
 */
export interface RevocationStore {
  revoke(kind: RevocationKind, id: string, entry: RedisRevokedEntry, ttl: number): Promise<RedisOperationResult<boolean>>;
  lookup(kind: RevocationKind, id: string): Promise<RedisOperationResult<RedisRevokedEntry | null>>;
}

const REVOCATION_REASONS: readonly string[] = ['logout', 'rotated', 'reuse_detected', 'security'];

const field = (value: object, name: string): unknown => Reflect.get(value, name);

export const isRevokedEntry = (value: unknown): value is RedisRevokedEntry => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const reason = field(value, 'reason');
  const family = field(value, 'family');
  return (
    typeof field(value, 'id') === 'string' &&
    typeof field(value, 'subject') === 'string' &&
    typeof field(value, 'revoked_at') === 'number' &&
    typeof reason === 'string' && REVOCATION_REASONS.includes(reason) &&
    (family === undefined || typeof family === 'string')
  );
};

export const blacklistKey = (kind: RevocationKind, id: string): string =>
  `${TOKEN_CONFIG.REDIS_KEY_PREFIX.BLACKLIST}:${kind}:${id}`;

export const createBlacklistRepository = (redisClient: RedisClient): RevocationStore => ({
  revoke: async (kind, id, entry, ttl) =>
    redisClient.setIfAbsent(blacklistKey(kind, id), entry, Math.max(1, Math.ceil(ttl))),

  lookup: async (kind, id) =>
    redisClient.get(blacklistKey(kind, id), isRevokedEntry),
});
