import { RedisRevokedEntry } from '@/types/redis.types';

/**
 * Reasons a token can be rejected. Kept for logs and tests; never sent to clients.
 */
export type InvalidTokenReason =
  | 'malformed'
  | 'unsigned'
  | 'unknown_key'
  | 'algorithm'
  | 'signature'
  | 'expired'
  | 'issuer'
  | 'wrong_type'
  | 'revoked'
  | 'revocation_unavailable';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Issuance could not produce a signature. Surfaces as 500.
 */
export class SigningError extends AppError {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message, 500, 'SIGNING_ERROR');
    this.name = 'SigningError';
  }
}

export class InvalidTokenError extends AppError {
  constructor(
    public readonly reason: InvalidTokenReason,
    message: string = `Invalid token: ${reason}`,
    public readonly revocation?: RedisRevokedEntry
  ) {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'InvalidTokenError';
  }
}

export class RevocationStoreTimeoutError extends InvalidTokenError {
  constructor(public readonly timeoutMs: number) {
    super('revocation_unavailable', `Revocation store did not answer within ${timeoutMs}ms`);
    this.name = 'RevocationStoreTimeoutError';
  }
}

export class InvalidCredentialsError extends AppError {
  constructor() {
    super('Invalid username or password', 401, 'INVALID_CREDENTIALS');
    this.name = 'InvalidCredentialsError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Insufficient permissions') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}
