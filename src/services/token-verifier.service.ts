import jwt from 'jsonwebtoken';
import {
  AccessTokenPayload,
  RefreshTokenPayload,
  TokenPayload,
  TokenType,
} from '@/types/token.types';
import { Clock } from '@/types/auth.types';
import { RedisOperationResult, RedisRevokedEntry } from '@/types/redis.types';
import { InvalidTokenError, RevocationStoreTimeoutError } from '@/errors/auth.errors';
import { RevocationStore } from '@/redis/blacklist.repository';
import { withTimeout } from '@/utils/timeout.utils';
import { logger } from '@/utils/logger';
import { KeyRing, SigningKey } from './key-ring.service';

export interface TokenVerifierOptions {
  keyRing: KeyRing;
  issuer: string;
  revocationStore: RevocationStore;
  revocationTimeoutMs: number;
  clock: Clock;
}

export interface TokenVerifier {
  verify(token: string, expectedType?: TokenType): Promise<TokenPayload>;
  verifyAccessToken(token: string): Promise<AccessTokenPayload>;
  verifyRefreshToken(token: string): Promise<RefreshTokenPayload>;
  decodeToken(token: string): TokenPayload | null;
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === 'string');

const claim = (value: object, name: string): unknown => Reflect.get(value, name);

export const isTokenPayload = (value: unknown): value is TokenPayload => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const sub = claim(value, 'sub');
  if (
    typeof sub !== 'string' || sub.length === 0 ||
    typeof claim(value, 'iss') !== 'string' ||
    typeof claim(value, 'iat') !== 'number' ||
    typeof claim(value, 'exp') !== 'number' ||
    typeof claim(value, 'jti') !== 'string'
  ) {
    return false;
  }
  const roles = claim(value, 'roles');
  if (roles !== undefined && !isStringArray(roles)) {
    return false;
  }
  const tokenType = claim(value, 'token_type');
  if (tokenType === 'access') {
    return true;
  }
  return tokenType === 'refresh' && typeof claim(value, 'family') === 'string';
};

/**
 * jsonwebtoken checks the signature before the time claims, so a forged
 * expired token reports `signature`.
 */
const toInvalidTokenError = (error: unknown): InvalidTokenError => {
  if (error instanceof jwt.TokenExpiredError) {
    return new InvalidTokenError('expired', 'Token has expired');
  }
  if (error instanceof jwt.JsonWebTokenError) {
    if (error.message === 'invalid signature') {
      return new InvalidTokenError('signature', 'Signature mismatch');
    }
    if (error.message === 'invalid algorithm') {
      return new InvalidTokenError('algorithm', 'Algorithm not allowed for this key');
    }
    if (error.message.startsWith('jwt issuer invalid')) {
      return new InvalidTokenError('issuer', 'Unexpected token issuer');
    }
  }
  return new InvalidTokenError('malformed', `Malformed token: ${error instanceof Error ? error.message : String(error)}`);
};

export const createTokenVerifier = (options: TokenVerifierOptions): TokenVerifier => {
  const { keyRing, issuer, revocationStore, revocationTimeoutMs, clock } = options;

  const decodeComplete = (token: string): jwt.Jwt | null => {
    try {
      return jwt.decode(token, { complete: true });
    } catch (error) {
      logger.debug(`Token could not be decoded: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  };

  const decodeToken = (token: string): TokenPayload | null => {
    const decoded = decodeComplete(token);
    return decoded && isTokenPayload(decoded.payload) ? decoded.payload : null;
  };

  const unwrapLookup = (result: RedisOperationResult<RedisRevokedEntry | null>): RedisRevokedEntry | null => {
    if (!result.success) {
      logger.error(`Revocation lookup failed: ${result.error?.code ?? 'UNKNOWN'} ${result.error?.message ?? ''}`);
      throw new InvalidTokenError('revocation_unavailable', 'Revocation store unavailable');
    }
    return result.data ?? null;
  };

  const assertNotRevoked = async (payload: TokenPayload): Promise<void> => {
    const lookups = Promise.all([
      revocationStore.lookup('token', payload.jti),
      payload.token_type === 'refresh'
        ? revocationStore.lookup('family', payload.family)
        : Promise.resolve<RedisOperationResult<RedisRevokedEntry | null>>({ success: true, data: null }),
    ]);
    const [tokenResult, familyResult] = await withTimeout(
      lookups,
      revocationTimeoutMs,
      () => new RevocationStoreTimeoutError(revocationTimeoutMs)
    );

    // Family revocation wins so a reused token is reported against its family
    const revocation = unwrapLookup(familyResult) ?? unwrapLookup(tokenResult);
    if (revocation) {
      throw new InvalidTokenError('revoked', 'Token has been revoked', revocation);
    }
  };

  const resolveKey = (header: jwt.JwtHeader): SigningKey => {
    if (typeof header.alg !== 'string' || (header.kid !== undefined && typeof header.kid !== 'string')) {
      throw new InvalidTokenError('malformed', 'Token header is malformed');
    }
    if (header.alg.length === 0 || header.alg.toLowerCase() === 'none') {
      throw new InvalidTokenError('unsigned', 'Unsigned tokens are not accepted');
    }

    const key = header.kid ? keyRing.find(header.kid) : keyRing.current();
    if (!key) {
      throw new InvalidTokenError('unknown_key', `Unknown signing key: ${header.kid ?? 'none'}`);
    }
    if (header.alg !== key.algorithm) {
      throw new InvalidTokenError('algorithm', `Algorithm ${header.alg} does not match key ${key.kid}`);
    }
    return key;
  };

  // The header is attacker-controlled JSON; anything unexpected in it is a malformed token
  const selectKey = (header: jwt.JwtHeader): SigningKey => {
    try {
      return resolveKey(header);
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        throw error;
      }
      throw toInvalidTokenError(error);
    }
  };

  const verify = async (token: string, expectedType: TokenType = 'access'): Promise<TokenPayload> => {
    const decoded = decodeComplete(token);
    if (!decoded) {
      throw new InvalidTokenError('malformed', 'Token is not a well-formed JWS');
    }

    const key = selectKey(decoded.header);

    let verified: string | jwt.JwtPayload;
    try {
      verified = jwt.verify(token, key.verificationKey, {
        algorithms: [key.algorithm],
        issuer,
        clockTimestamp: Math.floor(clock() / 1000),
      });
    } catch (error) {
      throw toInvalidTokenError(error);
    }

    if (!isTokenPayload(verified)) {
      throw new InvalidTokenError('malformed', 'Token claims are incomplete');
    }
    if (verified.token_type !== expectedType) {
      throw new InvalidTokenError('wrong_type', `Expected ${expectedType} token, got ${verified.token_type}`);
    }

    await assertNotRevoked(verified);
    return verified;
  };

  const verifyAccessToken = async (token: string): Promise<AccessTokenPayload> => {
    const payload = await verify(token, 'access');
    if (payload.token_type !== 'access') {
      throw new InvalidTokenError('wrong_type');
    }
    return payload;
  };

  const verifyRefreshToken = async (token: string): Promise<RefreshTokenPayload> => {
    const payload = await verify(token, 'refresh');
    if (payload.token_type !== 'refresh') {
      throw new InvalidTokenError('wrong_type');
    }
    return payload;
  };

  return {
    verify,
    verifyAccessToken,
    verifyRefreshToken,
    decodeToken,
  };
};
