import { createHmac, generateKeyPairSync } from 'crypto';
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '@/app';
import { createAsymmetricKey, createKeyRing, KeyRing } from '@/services/key-ring.service';
import {
  createTestContext,
  decodeHeader,
  encodeSegment,
  seedUser,
  TEST_ISSUER,
  TEST_START_SECONDS,
} from '../helpers/auth.helpers';

describe('RS256 signing keys', () => {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  });
  let keyRing: KeyRing;
  let app: Express;

  beforeEach(async () => {
    keyRing = createKeyRing([createAsymmetricKey('rsa-1', privateKey, publicKey, 'RS256')]);
    const testContext = createTestContext({ keyRing });
    await testContext.redis.flushall();
    await seedUser(testContext.userRepository, 'Abc', '123', ['user']);
    app = createApp(testContext.context);
  });

  test('should sign with the private key and verify with the public key', async () => {
    const login = await request(app).post('/auth/login').send({ username: 'Abc', password: '123' }).expect(200);
    const accessToken = String(login.body.accessToken);

    expect(decodeHeader(accessToken)).toEqual({ alg: 'RS256', typ: 'JWT', kid: 'rsa-1' });
    const profile = await request(app).get('/auth/me').set('Authorization', `Bearer ${accessToken}`).expect(200);
    expect(profile.body.subject).toBe('Abc');
  });

  test('should reject an HMAC token keyed with the public key', async () => {
    const header = encodeSegment({ alg: 'HS256', typ: 'JWT', kid: 'rsa-1' });
    const payload = encodeSegment({
      sub: 'Abc',
      iss: TEST_ISSUER,
      iat: TEST_START_SECONDS,
      exp: TEST_START_SECONDS + 300,
      jti: 'forged',
      token_type: 'access',
      roles: ['admin'],
    });
    const signature = createHmac('sha256', publicKey).update(`${header}.${payload}`).digest('base64url');

    await request(app)
      .get('/auth/me')
      .set('Authorization', `Bearer ${header}.${payload}.${signature}`)
      .expect(401);
  });

  test('should verify tokens of the previous key until it is retired', async () => {
    const login = await request(app).post('/auth/login').send({ username: 'Abc', password: '123' }).expect(200);
    const accessToken = String(login.body.accessToken);
    const next = generateKeyPairSync('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });

    keyRing.rotate(createAsymmetricKey('rsa-2', next.privateKey, next.publicKey, 'RS256'));
    await request(app).get('/auth/me').set('Authorization', `Bearer ${accessToken}`).expect(200);

    keyRing.retire('rsa-1');
    await request(app).get('/auth/me').set('Authorization', `Bearer ${accessToken}`).expect(401);
  });
});
