import { AppConfig } from '@/config';
import { UserRepository } from '@/database/user.repository';
import { RedisClient, RedisConnection } from '@/redis/client';
import { createBlacklistRepository, RevocationStore } from '@/redis/blacklist.repository';
import { Clock, systemClock } from '@/types/auth.types';
import { createAuthService, AuthService } from '@/services/auth.service';
import { KeyRing, loadKeyRing } from '@/services/key-ring.service';
import { createRefreshCoordinator, RefreshCoordinator } from '@/services/refresh.service';
import { createTokenIssuer, TokenIssuer } from '@/services/token-issuer.service';
import { createTokenVerifier, TokenVerifier } from '@/services/token-verifier.service';

export interface AuthContextOptions {
  config: AppConfig;
  redis: RedisConnection;
  userRepository: UserRepository;
  keyRing?: KeyRing;
  clock?: Clock;
}

/**
 * Everything a request handler needs, built once per process (or per test).
 */
export interface AuthContext {
  config: AppConfig;
  clock: Clock;
  keyRing: KeyRing;
  revocationStore: RevocationStore;
  userRepository: UserRepository;
  issuer: TokenIssuer;
  verifier: TokenVerifier;
  refreshCoordinator: RefreshCoordinator;
  authService: AuthService;
}

export const createAuthContext = (options: AuthContextOptions): AuthContext => {
  const { config, redis, userRepository } = options;
  const clock = options.clock ?? systemClock;
  const keyRing = options.keyRing ?? loadKeyRing(config.JWT);
  const revocationStore = createBlacklistRepository(new RedisClient(redis));

  const issuer = createTokenIssuer({
    keyRing,
    issuer: config.JWT.ISSUER,
    accessTokenTtl: config.ACCESS_TOKEN_TTL,
    refreshTokenTtl: config.REFRESH_TOKEN_TTL,
    clock,
  });

  const verifier = createTokenVerifier({
    keyRing,
    issuer: config.JWT.ISSUER,
    revocationStore,
    revocationTimeoutMs: config.REVOCATION_TIMEOUT_MS,
    clock,
  });

  const refreshCoordinator = createRefreshCoordinator({
    issuer,
    verifier,
    revocationStore,
    revocationTimeoutMs: config.REVOCATION_TIMEOUT_MS,
    policy: config.REFRESH_TOKEN_POLICY,
    clock,
  });

  const authService = createAuthService({
    userRepository,
    issuer,
    verifier,
    refreshCoordinator,
    revocationStore,
    revocationTimeoutMs: config.REVOCATION_TIMEOUT_MS,
    bcryptRounds: config.BCRYPT_ROUNDS,
    clock,
  });

  return {
    config,
    clock,
    keyRing,
    revocationStore,
    userRepository,
    issuer,
    verifier,
    refreshCoordinator,
    authService,
  };
};
