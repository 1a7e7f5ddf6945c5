import { AUTH_CONFIG } from '@/config/constants';
import { UserRepository } from '@/database/user.repository';
import { RevocationStore } from '@/redis/blacklist.repository';
import { AuthenticatedUser, Clock, LoginResponse, TokenResponse } from '@/types/auth.types';
import { RedisOperationResult } from '@/types/redis.types';
import { TokenPair } from '@/types/token.types';
import { AppError, InvalidCredentialsError, InvalidTokenError, RevocationStoreTimeoutError } from '@/errors/auth.errors';
import { hashPassword, verifyPassword } from '@/utils/hash.utils';
import { remainingLifetimeSeconds, withTimeout } from '@/utils/timeout.utils';
import { logger } from '@/utils/logger';
import { TokenIssuer } from './token-issuer.service';
import { TokenVerifier } from './token-verifier.service';
import { RefreshCoordinator } from './refresh.service';

export interface AuthServiceOptions {
  userRepository: UserRepository;
  issuer: TokenIssuer;
  verifier: TokenVerifier;
  refreshCoordinator: RefreshCoordinator;
  revocationStore: RevocationStore;
  revocationTimeoutMs: number;
  bcryptRounds: number;
  clock: Clock;
}

export interface AuthService {
  login(username: string, password: string): Promise<LoginResponse>;
  refresh(refreshToken: string): Promise<TokenResponse>;
  logout(user: AuthenticatedUser, refreshToken?: string): Promise<void>;
  validateSession(accessToken: string): Promise<AuthenticatedUser>;
}

export const createAuthService = (options: AuthServiceOptions): AuthService => {
  const {
    userRepository,
    issuer,
    verifier,
    refreshCoordinator,
    revocationStore,
    revocationTimeoutMs,
    bcryptRounds,
    clock,
  } = options;

  // Compared against when the user does not exist so both paths cost one bcrypt round
  let dummyHash: Promise<string> | undefined;
  const getDummyHash = (): Promise<string> => {
    dummyHash ??= hashPassword(AUTH_CONFIG.DUMMY_PASSWORD, bcryptRounds);
    return dummyHash;
  };

  const toTokenResponse = (tokens: TokenPair): TokenResponse => ({
    ...tokens,
    tokenType: 'Bearer',
    expiresIn: issuer.accessTokenTtl,
  });

  const login = async (username: string, password: string): Promise<LoginResponse> => {
    const user = await userRepository.findByUsername(username);
    const passwordMatches = await verifyPassword(password, user ? user.passwordHash : await getDummyHash());

    if (!user || !passwordMatches) {
      logger.warn(`Failed login attempt for ${username}`);
      throw new InvalidCredentialsError();
    }

    const tokens = issuer.issueTokens(user.username, { roles: user.roles });
    logger.info(`User ${user.username} logged in`);

    return {
      ...toTokenResponse(tokens),
      subject: user.username,
      roles: user.roles,
    };
  };

  const refresh = async (refreshToken: string): Promise<TokenResponse> => {
    const tokens = await refreshCoordinator.refresh(refreshToken);
    return toTokenResponse(tokens);
  };

  const revoke = async (...args: Parameters<RevocationStore['revoke']>): Promise<void> => {
    let result: RedisOperationResult<boolean>;
    try {
      result = await withTimeout(
        revocationStore.revoke(...args),
        revocationTimeoutMs,
        () => new RevocationStoreTimeoutError(revocationTimeoutMs)
      );
    } catch (error) {
      logger.error(`Revocation of ${args[0]} ${args[1]} failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new AppError('Revocation store unavailable', 503, 'SERVICE_UNAVAILABLE');
    }
    if (!result.success) {
      logger.error(`Revocation of ${args[0]} ${args[1]} failed: ${result.error?.message ?? 'unknown error'}`);
      throw new AppError('Revocation store unavailable', 503, 'SERVICE_UNAVAILABLE');
    }
  };

  const logout = async (user: AuthenticatedUser, refreshToken?: string): Promise<void> => {
    const now = clock();

    await revoke('token', user.jti, {
      id: user.jti,
      subject: user.subject,
      revoked_at: now,
      reason: 'logout',
    }, remainingLifetimeSeconds(user.expiresAt, now));

    if (refreshToken) {
      try {
        const payload = await verifier.verifyRefreshToken(refreshToken);
        if (payload.sub === user.subject) {
          await revoke('family', payload.family, {
            id: payload.family,
            subject: payload.sub,
            revoked_at: now,
            reason: 'logout',
          }, remainingLifetimeSeconds(payload.exp, now));
        } else {
          logger.warn(`Refresh token presented at logout belongs to another subject than ${user.subject}`);
        }
      } catch (error) {
        if (!(error instanceof InvalidTokenError)) {
          throw error;
        }
        if (error.reason === 'revocation_unavailable') {
          logger.error(`Refresh token at logout could not be checked: ${error.message}`);
          throw new AppError('Revocation store unavailable', 503, 'SERVICE_UNAVAILABLE');
        }
        logger.debug(`Ignoring refresh token at logout: ${error.reason}`);
      }
    }

    logger.info(`User ${user.subject} logged out`);
  };

  const validateSession = async (accessToken: string): Promise<AuthenticatedUser> => {
    const payload = await verifier.verifyAccessToken(accessToken);
    return {
      subject: payload.sub,
      roles: payload.roles ?? [],
      jti: payload.jti,
      expiresAt: payload.exp,
    };
  };

  return { login, refresh, logout, validateSession };
};
