/**
 * Discriminates the two token kinds. Resource endpoints only accept `access`.
 */
export type TokenType = 'access' | 'refresh';

/**
 * Application-defined claims embedded next to the registered ones.
 */
export interface CustomClaims {
  roles?: string[];
  [claim: string]: unknown;
}

/**
 * Claims shared by every token this service signs
 */
export interface BaseTokenPayload extends CustomClaims {
  sub: string;                 // Subject (username)
  iss: string;                 // Issuer (service identity)
  iat: number;                 // Issued at, seconds since epoch
  exp: number;                 // Expiration, fixed at issuance
  jti: string;                 // JWT ID (unique token identifier)
}

/**
 * JWT Access Token Payload
 * Short-lived token for API authentication
 */
export interface AccessTokenPayload extends BaseTokenPayload {
  token_type: 'access';
}

/**
 * JWT Refresh Token Payload
 * Long-lived token for obtaining new access tokens
 */
export interface RefreshTokenPayload extends BaseTokenPayload {
  token_type: 'refresh';
  family: string;              // Family ID for rotation detection
  parent?: string;             // JTI of the refresh token this one replaced
}

export type TokenPayload = AccessTokenPayload | RefreshTokenPayload;

/**
 * Token pair returned to client
 */
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/**
 * Ancestry of a rotated refresh token
 */
export interface RefreshLineage {
  family: string;
  parent: string;
  expiresAt: number;           // Absolute exp (seconds) inherited from the replaced token
  issuedAt?: number;           // iat (seconds) of the rotation, read once by the caller
}

export const RESERVED_CLAIMS: readonly string[] = [
  'sub', 'iss', 'iat', 'exp', 'nbf', 'aud', 'jti', 'token_type', 'family', 'parent',
];
