export const TOKEN_CONFIG = {
  TOKEN_FAMILY_LENGTH: 16,             // Random bytes for family ID
  JTI_LENGTH: 32,                      // Random bytes for JWT ID

  REDIS_KEY_PREFIX: {
    BLACKLIST: 'blacklist',
  },
} as const;

export const AUTH_CONFIG = {
  DUMMY_PASSWORD: 'dummy-password-for-timing-safety',
  BEARER_PREFIX: 'Bearer ',
} as const;
