import { createHmac } from 'crypto';
import jwt from 'jsonwebtoken';
import RedisMock from 'ioredis-mock';
import { createKeyRing, createSymmetricKey, KeyRing } from '@/services/key-ring.service';
import { createTokenIssuer, TokenIssuer } from '@/services/token-issuer.service';
import { createTokenVerifier, TokenVerifier } from '@/services/token-verifier.service';
import { createBlacklistRepository, RevocationStore } from '@/redis/blacklist.repository';
import { RedisClient } from '@/redis/client';
import { RevocationStoreTimeoutError } from '@/errors/auth.errors';
import {
  createManualClock,
  decodeAccessPayload,
  decodeRefreshPayload,
  encodeSegment,
  ManualClock,
  rejectionOf,
  TEST_ISSUER,
  TEST_SECRET,
  TEST_START_SECONDS,
} from '../helpers/auth.helpers';

describe('Token Verifier', () => {
  const redis = new RedisMock();
  let clock: ManualClock;
  let keyRing: KeyRing;
  let revocationStore: RevocationStore;
  let issuer: TokenIssuer;
  let verifier: TokenVerifier;

  const buildVerifier = (store: RevocationStore, revocationTimeoutMs: number = 250): TokenVerifier =>
    createTokenVerifier({ keyRing, issuer: TEST_ISSUER, revocationStore: store, revocationTimeoutMs, clock: clock.now });

  beforeEach(async () => {
    await redis.flushall();
    clock = createManualClock();
    keyRing = createKeyRing([createSymmetricKey('primary', TEST_SECRET)]);
    revocationStore = createBlacklistRepository(new RedisClient(redis));
    issuer = createTokenIssuer({ keyRing, issuer: TEST_ISSUER, accessTokenTtl: 300, refreshTokenTtl: 900, clock: clock.now });
    verifier = buildVerifier(revocationStore);
  });

  const accessClaims = () => ({
    sub: 'Abc',
    iss: TEST_ISSUER,
    iat: TEST_START_SECONDS,
    exp: TEST_START_SECONDS + 300,
    jti: 'jti-forged',
    token_type: 'access',
  });

  test('should return the subject of a token it issued', async () => {
    const token = issuer.issueAccessToken('Abc', { roles: ['user'] });
    const payload = await verifier.verifyAccessToken(token);
    expect(payload.sub).toBe('Abc');
    expect(payload.roles).toEqual(['user']);
  });

  test('should accept a token one second before expiry', async () => {
    const token = issuer.issueAccessToken('Abc');
    clock.advance(299);
    await expect(verifier.verifyAccessToken(token)).resolves.toMatchObject({ sub: 'Abc' });
  });

  test('should treat a token as expired at exactly exp', async () => {
    const token = issuer.issueAccessToken('Abc');
    clock.advance(300);
    expect((await rejectionOf(verifier.verifyAccessToken(token))).reason).toBe('expired');
  });

  test('should reject a payload altered after signing', async () => {
    const [header, , signature] = issuer.issueAccessToken('Abc').split('.');
    const tampered = `${header}.${encodeSegment({ ...accessClaims(), sub: 'Mallory' })}.${signature}`;
    expect((await rejectionOf(verifier.verifyAccessToken(tampered))).reason).toBe('signature');
  });

  test('should report a forged signature before expiry', async () => {
    const [header, , signature] = issuer.issueAccessToken('Abc').split('.');
    const tampered = `${header}.${encodeSegment({ ...accessClaims(), sub: 'Mallory' })}.${signature}`;
    clock.advance(3600);
    expect((await rejectionOf(verifier.verifyAccessToken(tampered))).reason).toBe('signature');
  });

  test('should reject unsigned tokens', async () => {
    const unsigned = `${encodeSegment({ alg: 'none', typ: 'JWT', kid: 'primary' })}.${encodeSegment(accessClaims())}.`;
    expect((await rejectionOf(verifier.verifyAccessToken(unsigned))).reason).toBe('unsigned');
  });

  test('should reject a header whose alg is not a string', async () => {
    const body = encodeSegment(accessClaims());
    for (const alg of [123, ['HS256'], { name: 'HS256' }]) {
      const token = `${encodeSegment({ alg, typ: 'JWT', kid: 'primary' })}.${body}.c2lnbmF0dXJl`;
      expect((await rejectionOf(verifier.verifyAccessToken(token))).reason).toBe('malformed');
    }
  });

  test('should reject a header whose kid is not a string', async () => {
    const token = `${encodeSegment({ alg: 'HS256', typ: 'JWT', kid: 7 })}.${encodeSegment(accessClaims())}.c2lnbmF0dXJl`;
    expect((await rejectionOf(verifier.verifyAccessToken(token))).reason).toBe('malformed');
  });

  test('should reject tokens that are not a JWS', async () => {
    expect((await rejectionOf(verifier.verifyAccessToken('not-a-token'))).reason).toBe('malformed');
  });

  test('should reject a token signed by an unknown key', async () => {
    const token = jwt.sign(accessClaims(), TEST_SECRET, { algorithm: 'HS256', keyid: 'unknown' });
    expect((await rejectionOf(verifier.verifyAccessToken(token))).reason).toBe('unknown_key');
  });

  test('should reject an algorithm the key was not configured for', async () => {
    const token = jwt.sign(accessClaims(), TEST_SECRET, { algorithm: 'HS512', keyid: 'primary' });
    expect((await rejectionOf(verifier.verifyAccessToken(token))).reason).toBe('algorithm');
  });

  test('should reject a token from another issuer', async () => {
    const token = jwt.sign({ ...accessClaims(), iss: 'someone-else' }, TEST_SECRET, { algorithm: 'HS256', keyid: 'primary' });
    expect((await rejectionOf(verifier.verifyAccessToken(token))).reason).toBe('issuer');
  });

  test('should treat a not-before claim in the future as malformed', async () => {
    const token = jwt.sign({ ...accessClaims(), nbf: TEST_START_SECONDS + 60 }, TEST_SECRET, { algorithm: 'HS256', keyid: 'primary' });
    expect((await rejectionOf(verifier.verifyAccessToken(token))).reason).toBe('malformed');
  });

  test('should reject a signed token that lacks required claims', async () => {
    const header = encodeSegment({ alg: 'HS256', typ: 'JWT', kid: 'primary' });
    const body = encodeSegment({ sub: 'Abc', iss: TEST_ISSUER, exp: TEST_START_SECONDS + 300 });
    const signature = createHmac('sha256', TEST_SECRET).update(`${header}.${body}`).digest('base64url');
    expect((await rejectionOf(verifier.verifyAccessToken(`${header}.${body}.${signature}`))).reason).toBe('malformed');
  });

  test('should not accept a refresh token where an access token is expected', async () => {
    const refreshToken = issuer.issueRefreshToken('Abc');
    expect((await rejectionOf(verifier.verifyAccessToken(refreshToken))).reason).toBe('wrong_type');
  });

  test('should not accept an access token where a refresh token is expected', async () => {
    const accessToken = issuer.issueAccessToken('Abc');
    expect((await rejectionOf(verifier.verifyRefreshToken(accessToken))).reason).toBe('wrong_type');
  });

  test('should reject a revoked token id', async () => {
    const token = issuer.issueAccessToken('Abc');
    const { jti } = decodeAccessPayload(token);
    await revocationStore.revoke('token', jti, { id: jti, subject: 'Abc', revoked_at: 0, reason: 'logout' }, 300);

    const error = await rejectionOf(verifier.verifyAccessToken(token));
    expect(error.reason).toBe('revoked');
    expect(error.revocation?.reason).toBe('logout');
  });

  test('should report the family revocation when both the token and its family are revoked', async () => {
    const token = issuer.issueRefreshToken('Abc');
    const { jti, family } = decodeRefreshPayload(token);
    await revocationStore.revoke('token', jti, { id: jti, subject: 'Abc', revoked_at: 0, reason: 'rotated', family }, 900);
    await revocationStore.revoke('family', family, { id: family, subject: 'Abc', revoked_at: 0, reason: 'reuse_detected' }, 900);

    const error = await rejectionOf(verifier.verifyRefreshToken(token));
    expect(error.reason).toBe('revoked');
    expect(error.revocation).toEqual({ id: family, subject: 'Abc', revoked_at: 0, reason: 'reuse_detected' });
  });

  test('should fail closed when the revocation store does not answer in time', async () => {
    const stalled: RevocationStore = {
      revoke: () => new Promise(() => undefined),
      lookup: () => new Promise(() => undefined),
    };
    const token = issuer.issueAccessToken('Abc');

    const error = await rejectionOf(buildVerifier(stalled, 20).verifyAccessToken(token));
    expect(error).toBeInstanceOf(RevocationStoreTimeoutError);
    expect(error.reason).toBe('revocation_unavailable');
  });

  test('should fail closed when the revocation store reports an error', async () => {
    const failing: RevocationStore = {
      revoke: async () => ({ success: false, error: { code: 'SET_FAILED', message: 'connection lost' } }),
      lookup: async () => ({ success: false, error: { code: 'GET_FAILED', message: 'connection lost' } }),
    };
    const token = issuer.issueAccessToken('Abc');

    expect((await rejectionOf(buildVerifier(failing).verifyAccessToken(token))).reason).toBe('revocation_unavailable');
  });

  test('should keep verifying tokens of a rotated key until it is retired', async () => {
    const token = issuer.issueAccessToken('Abc');
    keyRing.rotate(createSymmetricKey('next', 'test-secret-rotated-test-secret-rotated'));

    await expect(verifier.verifyAccessToken(token)).resolves.toMatchObject({ sub: 'Abc' });
    await expect(verifier.verifyAccessToken(issuer.issueAccessToken('Abc'))).resolves.toMatchObject({ sub: 'Abc' });

    keyRing.retire('primary');
    expect((await rejectionOf(verifier.verifyAccessToken(token))).reason).toBe('unknown_key');
  });

  test('should decode a token without verifying it', () => {
    const token = issuer.issueAccessToken('Abc');
    expect(verifier.decodeToken(token)?.sub).toBe('Abc');
    expect(verifier.decodeToken('garbage')).toBeNull();
  });
});
