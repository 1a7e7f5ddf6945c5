import { RefreshTokenPolicy } from '@/config';
import { Clock } from '@/types/auth.types';
import { RefreshTokenPayload, TokenPair } from '@/types/token.types';
import { RedisOperationResult, RedisRevokedEntry, RevocationKind } from '@/types/redis.types';
import { InvalidTokenError, RevocationStoreTimeoutError } from '@/errors/auth.errors';
import { RevocationStore } from '@/redis/blacklist.repository';
import { remainingLifetimeSeconds, withTimeout } from '@/utils/timeout.utils';
import { logger } from '@/utils/logger';
import { extractCustomClaims, TokenIssuer } from './token-issuer.service';
import { TokenVerifier } from './token-verifier.service';

export interface RefreshCoordinatorOptions {
  issuer: TokenIssuer;
  verifier: TokenVerifier;
  revocationStore: RevocationStore;
  revocationTimeoutMs: number;
  policy: RefreshTokenPolicy;
  clock: Clock;
}

export interface RefreshCoordinator {
  readonly policy: RefreshTokenPolicy;
  refresh(refreshToken: string): Promise<TokenPair>;
}

/**
 * Trades a refresh token for a new access token.
 *
 * Under `rotate` the presented token is burned with an atomic set-if-absent and
 * replaced by a sibling in the same family that keeps the original expiry, so
 * a session never outlives the lifetime granted at login. Presenting a burned
 * token revokes the whole family.
 */
export const createRefreshCoordinator = (options: RefreshCoordinatorOptions): RefreshCoordinator => {
  const { issuer, verifier, revocationStore, revocationTimeoutMs, policy, clock } = options;

  const revoke = (kind: RevocationKind, id: string, entry: RedisRevokedEntry, ttl: number): Promise<RedisOperationResult<boolean>> =>
    withTimeout(
      revocationStore.revoke(kind, id, entry, ttl),
      revocationTimeoutMs,
      () => new RevocationStoreTimeoutError(revocationTimeoutMs)
    );

  const revokeFamily = async (subject: string, family: string): Promise<void> => {
    logger.notify(`Refresh token reuse detected for ${subject}; revoking token family ${family}`);
    const result = await revoke('family', family, {
      id: family,
      subject,
      revoked_at: clock(),
      reason: 'reuse_detected',
    }, issuer.refreshTokenTtl);
    if (!result.success) {
      logger.error(`Failed to revoke token family ${family}: ${result.error?.message ?? 'unknown error'}`);
    }
  };

  const burn = async (payload: RefreshTokenPayload, now: number): Promise<void> => {
    const claimed = await revoke('token', payload.jti, {
      id: payload.jti,
      subject: payload.sub,
      revoked_at: now,
      reason: 'rotated',
      family: payload.family,
    }, remainingLifetimeSeconds(payload.exp, now));

    if (!claimed.success) {
      throw new InvalidTokenError('revocation_unavailable', 'Revocation store unavailable');
    }
    if (!claimed.data) {
      // A concurrent refresh already rotated this token
      await revokeFamily(payload.sub, payload.family);
      throw new InvalidTokenError('revoked', 'Refresh token has already been used');
    }
  };

  const refresh = async (refreshToken: string): Promise<TokenPair> => {
    let payload: RefreshTokenPayload;
    try {
      payload = await verifier.verifyRefreshToken(refreshToken);
    } catch (error) {
      if (error instanceof InvalidTokenError && error.revocation?.reason === 'rotated' && error.revocation.family) {
        await revokeFamily(error.revocation.subject, error.revocation.family);
      }
      throw error;
    }

    const claims = extractCustomClaims(payload);

    if (policy === 'reuse') {
      return {
        accessToken: issuer.issueAccessToken(payload.sub, claims),
        refreshToken,
      };
    }

    // A rotated token needs iat < exp, and the clock may have moved since verification
    const now = clock();
    const issuedAt = Math.floor(now / 1000);
    if (issuedAt >= payload.exp) {
      throw new InvalidTokenError('expired', 'Token has expired');
    }

    await burn(payload, now);
    return {
      accessToken: issuer.issueAccessToken(payload.sub, claims),
      refreshToken: issuer.issueRefreshToken(payload.sub, claims, {
        family: payload.family,
        parent: payload.jti,
        expiresAt: payload.exp,
        issuedAt,
      }),
    };
  };

  return { policy, refresh };
};
