import { AuthContext } from '@/core/context';
import { AppError, InvalidCredentialsError } from '@/errors/auth.errors';
import { createAuthService } from '@/services/auth.service';
import { createTokenVerifier } from '@/services/token-verifier.service';
import { RevocationStore } from '@/redis/blacklist.repository';
import {
  createTestContext,
  decodeAccessPayload,
  decodeRefreshPayload,
  ManualClock,
  rejectionOf,
  seedUser,
  TEST_START_SECONDS,
} from '../helpers/auth.helpers';

describe('Auth Service', () => {
  let context: AuthContext;
  let clock: ManualClock;

  beforeEach(async () => {
    const testContext = createTestContext();
    await testContext.redis.flushall();
    context = testContext.context;
    clock = testContext.clock;
    await seedUser(testContext.userRepository, 'Abc', '123', ['user']);
  });

  describe('login', () => {
    test('should issue a token pair for valid credentials', async () => {
      const response = await context.authService.login('Abc', '123');

      expect(response.tokenType).toBe('Bearer');
      expect(response.expiresIn).toBe(300);
      expect(response.subject).toBe('Abc');
      expect(response.roles).toEqual(['user']);
      expect(decodeAccessPayload(response.accessToken)).toMatchObject({ sub: 'Abc', roles: ['user'] });
      expect(decodeRefreshPayload(response.refreshToken)).toMatchObject({ sub: 'Abc', roles: ['user'] });
    });

    test('should reject a wrong password', async () => {
      await expect(context.authService.login('Abc', '1234')).rejects.toBeInstanceOf(InvalidCredentialsError);
    });

    test('should reject an unknown user the same way', async () => {
      await expect(context.authService.login('Nobody', '123')).rejects.toThrow('Invalid username or password');
    });
  });

  describe('refresh', () => {
    test('should wrap refreshed tokens in a bearer response', async () => {
      const { refreshToken } = await context.authService.login('Abc', '123');
      clock.advance(360);

      const response = await context.authService.refresh(refreshToken);

      expect(response.tokenType).toBe('Bearer');
      expect(response.expiresIn).toBe(300);
      expect(decodeAccessPayload(response.accessToken).sub).toBe('Abc');
    });
  });

  describe('validateSession', () => {
    test('should describe the caller of a valid access token', async () => {
      const { accessToken } = await context.authService.login('Abc', '123');
      const { jti } = decodeAccessPayload(accessToken);

      await expect(context.authService.validateSession(accessToken)).resolves.toEqual({
        subject: 'Abc',
        roles: ['user'],
        jti,
        expiresAt: TEST_START_SECONDS + 300,
      });
    });
  });

  describe('logout', () => {
    test('should revoke the access token', async () => {
      const { accessToken } = await context.authService.login('Abc', '123');
      const user = await context.authService.validateSession(accessToken);

      await context.authService.logout(user);

      const error = await rejectionOf(context.authService.validateSession(accessToken));
      expect(error.reason).toBe('revoked');
      expect(error.revocation?.reason).toBe('logout');
    });

    test('should revoke the refresh token family when a refresh token is supplied', async () => {
      const { accessToken, refreshToken } = await context.authService.login('Abc', '123');
      const user = await context.authService.validateSession(accessToken);

      await context.authService.logout(user, refreshToken);

      const error = await rejectionOf(context.authService.refresh(refreshToken));
      expect(error.reason).toBe('revoked');
      expect(error.revocation).toEqual({
        id: decodeRefreshPayload(refreshToken).family,
        subject: 'Abc',
        revoked_at: clock.now(),
        reason: 'logout',
      });
    });

    test('should leave the family alone when the refresh token belongs to someone else', async () => {
      const own = await context.authService.login('Abc', '123');
      const foreign = context.issuer.issueTokens('Other');
      const user = await context.authService.validateSession(own.accessToken);

      await context.authService.logout(user, foreign.refreshToken);

      await expect(context.authService.refresh(foreign.refreshToken)).resolves.toMatchObject({ tokenType: 'Bearer' });
    });

    test('should ignore an invalid refresh token', async () => {
      const { accessToken } = await context.authService.login('Abc', '123');
      const user = await context.authService.validateSession(accessToken);

      await expect(context.authService.logout(user, 'not-a-token')).resolves.toBeUndefined();
    });

    test('should surface a 503 when the revocation cannot be stored', async () => {
      const failing: RevocationStore = {
        lookup: async () => ({ success: true, data: null }),
        revoke: async () => ({ success: false, error: { code: 'SET_FAILED', message: 'connection lost' } }),
      };
      const authService = createAuthService({
        userRepository: context.userRepository,
        issuer: context.issuer,
        verifier: context.verifier,
        refreshCoordinator: context.refreshCoordinator,
        revocationStore: failing,
        revocationTimeoutMs: 250,
        bcryptRounds: 4,
        clock: clock.now,
      });
      const { accessToken } = await authService.login('Abc', '123');
      const user = await authService.validateSession(accessToken);

      const error = await authService.logout(user).then(() => undefined, (reason: unknown) => reason);
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ statusCode: 503, code: 'SERVICE_UNAVAILABLE' });
    });

    test('should surface a 503 when the refresh token cannot be checked', async () => {
      const stalled: RevocationStore = {
        lookup: () => new Promise(() => undefined),
        revoke: async () => ({ success: true, data: true }),
      };
      const verifier = createTokenVerifier({
        keyRing: context.keyRing,
        issuer: context.config.JWT.ISSUER,
        revocationStore: stalled,
        revocationTimeoutMs: 20,
        clock: clock.now,
      });
      const authService = createAuthService({
        userRepository: context.userRepository,
        issuer: context.issuer,
        verifier,
        refreshCoordinator: context.refreshCoordinator,
        revocationStore: stalled,
        revocationTimeoutMs: 20,
        bcryptRounds: 4,
        clock: clock.now,
      });
      const { accessToken, refreshToken } = await context.authService.login('Abc', '123');
      const user = await context.authService.validateSession(accessToken);

      const error = await authService.logout(user, refreshToken).then(() => undefined, (reason: unknown) => reason);
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ statusCode: 503, code: 'SERVICE_UNAVAILABLE' });
    });
  });

  test('should build every component from one configuration', () => {
    const { context: built } = createTestContext({ env: { REFRESH_TOKEN_POLICY: 'reuse', ACCESS_TOKEN_TTL: '120' } });
    expect(built.refreshCoordinator.policy).toBe('reuse');
    expect(built.issuer.accessTokenTtl).toBe(120);
    expect(built.keyRing.current()?.kid).toBe('primary');
  });
});
