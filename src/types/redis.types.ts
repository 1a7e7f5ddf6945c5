export type RevocationKind = 'token' | 'family';

export type RevocationReason = 'logout' | 'rotated' | 'reuse_detected' | 'security';

/**
 * Blacklisted/revoked token or token family entry
 */
export interface RedisRevokedEntry {
  id: string;                  // Token JTI or family ID
  subject: string;             // Owner
  revoked_at: number;          // Unix timestamp (ms)
  reason: RevocationReason;
  family?: string;             // Family of a revoked refresh token
}

/**
 * Redis operation result
 */
export interface RedisOperationResult<T = void> {
  success: boolean;
  data?: T;
  error?: RedisError;
}

/**
 * Redis error type
 */
export interface RedisError {
  code: string;
  message: string;
  details?: unknown;
}
