import { TokenPair } from './token.types';

/**
 * Body returned by login and refresh
 */
export interface TokenResponse extends TokenPair {
  tokenType: 'Bearer';
  expiresIn: number;           // Access token lifetime in seconds
}

/**
 * Login response data
 */
export interface LoginResponse extends TokenResponse {
  subject: string;
  roles: string[];
}

/**
 * Identity attached to an authenticated request
 */
export interface AuthenticatedUser {
  subject: string;
  roles: string[];
  jti: string;
  expiresAt: number;
}

/**
 * Milliseconds since epoch. Injected so tests can move time.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
