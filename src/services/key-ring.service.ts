import { readFileSync } from 'node:fs';
import { Secret } from 'jsonwebtoken';
import { JwtConfig, SigningAlgorithm } from '@/config';
import { logger } from '@/utils/logger';

/**
 * A key addressed by `kid`. For HMAC algorithms both halves are the shared secret.
 */
export interface SigningKey {
  kid: string;
  algorithm: SigningAlgorithm;
  signingKey?: Secret;
  verificationKey: Secret;
}

export interface KeyRing {
  current(): SigningKey | undefined;
  find(kid: string): SigningKey | undefined;
  rotate(key: SigningKey): void;
  retire(kid: string): boolean;
  kids(): string[];
}

export const createSymmetricKey = (kid: string, secret: string, algorithm: SigningAlgorithm = 'HS256'): SigningKey => {
  if (!algorithm.startsWith('HS')) {
    throw new Error(`${algorithm} is not a symmetric algorithm`);
  }
  return { kid, algorithm, signingKey: secret, verificationKey: secret };
};

export const createAsymmetricKey = (
  kid: string,
  privateKey: string | undefined,
  publicKey: string,
  algorithm: SigningAlgorithm
): SigningKey => {
  if (algorithm.startsWith('HS')) {
    throw new Error(`${algorithm} is not an asymmetric algorithm`);
  }
  return { kid, algorithm, signingKey: privateKey, verificationKey: publicKey };
};

/**
 * Holds the current signing key plus keys that still verify tokens they signed
 * earlier. The first key passed in becomes current.
 */
export const createKeyRing = (initialKeys: SigningKey[] = []): KeyRing => {
  const keys = new Map<string, SigningKey>();
  let currentKid: string | undefined;

  for (const key of initialKeys) {
    keys.set(key.kid, key);
  }
  currentKid = initialKeys[0]?.kid;

  return {
    current: () => {
      const key = currentKid ? keys.get(currentKid) : undefined;
      return key?.signingKey ? key : undefined;
    },
    find: (kid) => keys.get(kid),
    rotate: (key) => {
      if (!key.signingKey) {
        throw new Error(`Key ${key.kid} has no signing material`);
      }
      keys.set(key.kid, key);
      const previous = currentKid;
      currentKid = key.kid;
      logger.notify(`Signing key rotated from ${previous ?? 'none'} to ${key.kid}`);
    },
    retire: (kid) => {
      if (kid === currentKid) {
        currentKid = undefined;
      }
      return keys.delete(kid);
    },
    kids: () => Array.from(keys.keys()),
  };
};

/**
 * Builds the ring from configuration: the configured key is current and an
 * optional previous HMAC secret is kept for verification only.
 */
export const loadKeyRing = (jwt: JwtConfig): KeyRing => {
  const keys: SigningKey[] = [];

  if (jwt.ALGORITHM.startsWith('HS')) {
    if (!jwt.SECRET) {
      throw new Error(`JWT_SECRET is required for ${jwt.ALGORITHM}`);
    }
    keys.push(createSymmetricKey(jwt.KEY_ID, jwt.SECRET, jwt.ALGORITHM));
    if (jwt.PREVIOUS_SECRET && jwt.PREVIOUS_KEY_ID) {
      keys.push({
        kid: jwt.PREVIOUS_KEY_ID,
        algorithm: jwt.ALGORITHM,
        verificationKey: jwt.PREVIOUS_SECRET,
      });
    }
  } else {
    if (!jwt.PRIVATE_KEY_PATH || !jwt.PUBLIC_KEY_PATH) {
      throw new Error(`Key paths are required for ${jwt.ALGORITHM}`);
    }
    const privateKey = readFileSync(jwt.PRIVATE_KEY_PATH, 'utf8');
    const publicKey = readFileSync(jwt.PUBLIC_KEY_PATH, 'utf8');
    keys.push(createAsymmetricKey(jwt.KEY_ID, privateKey, publicKey, jwt.ALGORITHM));
  }

  return createKeyRing(keys);
};
