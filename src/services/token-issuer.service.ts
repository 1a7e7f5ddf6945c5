import jwt from 'jsonwebtoken';
import { randomBytes } from 'crypto';
import { TOKEN_CONFIG } from '@/config/constants';
import {
  AccessTokenPayload,
  CustomClaims,
  RefreshLineage,
  RefreshTokenPayload,
  RESERVED_CLAIMS,
  TokenPair,
  TokenPayload,
} from '@/types/token.types';
import { Clock } from '@/types/auth.types';
import { SigningError } from '@/errors/auth.errors';
import { KeyRing } from './key-ring.service';

export interface TokenIssuerOptions {
  keyRing: KeyRing;
  issuer: string;
  accessTokenTtl: number;
  refreshTokenTtl: number;
  clock: Clock;
}

export interface TokenIssuer {
  readonly accessTokenTtl: number;
  readonly refreshTokenTtl: number;
  issueTokens(subject: string, claims?: CustomClaims): TokenPair;
  issueAccessToken(subject: string, claims?: CustomClaims): string;
  issueRefreshToken(subject: string, claims?: CustomClaims, lineage?: RefreshLineage): string;
}

const generateJti = () => randomBytes(TOKEN_CONFIG.JTI_LENGTH).toString('hex');
const generateTokenFamily = () => randomBytes(TOKEN_CONFIG.TOKEN_FAMILY_LENGTH).toString('hex');

/**
 * Strips registered and lineage claims, leaving what the application added at login.
 */
export const extractCustomClaims = (payload: TokenPayload): CustomClaims => {
  const claims: CustomClaims = {};
  for (const [name, value] of Object.entries(payload)) {
    if (!RESERVED_CLAIMS.includes(name)) {
      claims[name] = value;
    }
  }
  return claims;
};

const assertIssuable = (subject: string, claims: CustomClaims): void => {
  if (subject.trim().length === 0) {
    throw new SigningError('Cannot issue a token without a subject');
  }
  const reserved = Object.keys(claims).filter(name => RESERVED_CLAIMS.includes(name));
  if (reserved.length > 0) {
    throw new SigningError(`Custom claims cannot override reserved claims: ${reserved.join(', ')}`);
  }
};

export const createTokenIssuer = (options: TokenIssuerOptions): TokenIssuer => {
  const { keyRing, issuer, accessTokenTtl, refreshTokenTtl, clock } = options;

  const sign = (payload: TokenPayload): string => {
    const key = keyRing.current();
    if (!key || !key.signingKey) {
      throw new SigningError('No signing key available');
    }
    try {
      return jwt.sign(payload, key.signingKey, {
        algorithm: key.algorithm,
        keyid: key.kid,
      });
    } catch (error) {
      throw new SigningError(
        `Failed to sign ${payload.token_type} token: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  };

  const nowSeconds = () => Math.floor(clock() / 1000);

  const issueAccessToken = (subject: string, claims: CustomClaims = {}): string => {
    assertIssuable(subject, claims);
    const iat = nowSeconds();
    const payload: AccessTokenPayload = {
      ...claims,
      sub: subject,
      iss: issuer,
      iat,
      exp: iat + accessTokenTtl,
      jti: generateJti(),
      token_type: 'access',
    };
    return sign(payload);
  };

  const issueRefreshToken = (subject: string, claims: CustomClaims = {}, lineage?: RefreshLineage): string => {
    assertIssuable(subject, claims);
    const iat = lineage?.issuedAt ?? nowSeconds();
    const payload: RefreshTokenPayload = {
      ...claims,
      sub: subject,
      iss: issuer,
      iat,
      exp: lineage ? lineage.expiresAt : iat + refreshTokenTtl,
      jti: generateJti(),
      token_type: 'refresh',
      family: lineage ? lineage.family : generateTokenFamily(),
      ...(lineage ? { parent: lineage.parent } : {}),
    };
    return sign(payload);
  };

  const issueTokens = (subject: string, claims: CustomClaims = {}): TokenPair => ({
    accessToken: issueAccessToken(subject, claims),
    refreshToken: issueRefreshToken(subject, claims),
  });

  return {
    accessTokenTtl,
    refreshTokenTtl,
    issueTokens,
    issueAccessToken,
    issueRefreshToken,
  };
};
