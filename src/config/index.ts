export type SigningAlgorithm = 'HS256' | 'HS384' | 'HS512' | 'RS256' | 'ES256';

export type RefreshTokenPolicy = 'rotate' | 'reuse';

export const SIGNING_ALGORITHMS: readonly SigningAlgorithm[] = ['HS256', 'HS384', 'HS512', 'RS256', 'ES256'];

export interface JwtConfig {
  ALGORITHM: SigningAlgorithm;
  SECRET?: string;
  PRIVATE_KEY_PATH?: string;
  PUBLIC_KEY_PATH?: string;
  KEY_ID: string;
  PREVIOUS_SECRET?: string;
  PREVIOUS_KEY_ID?: string;
  ISSUER: string;
}

export interface AppConfig {
  PORT: number;
  NODE_ENV: string;
  LOG_LEVEL: string;
  MONGODB_URI: string;
  REDIS_URL: string;
  JWT: JwtConfig;
  ACCESS_TOKEN_TTL: number;
  REFRESH_TOKEN_TTL: number;
  REFRESH_TOKEN_POLICY: RefreshTokenPolicy;
  REVOCATION_TIMEOUT_MS: number;
  BCRYPT_ROUNDS: number;
  ALLOWED_ORIGINS: string[];
}

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const requiredEnvVars = ['MONGODB_URI', 'REDIS_URL'];

function validateEnvironmentVariable(name: string, value: string | undefined, required: boolean = true): string {
  if (!value && required) {
    throw new ConfigurationError(`Required environment variable ${name} is not set`);
  }

  if (!value && !required) {
    return '';
  }

  if (value && value.trim() === '') {
    throw new ConfigurationError(`Environment variable ${name} cannot be empty`);
  }

  return value || '';
}

function validateNumericEnvironmentVariable(name: string, value: string | undefined, required: boolean = true, defaultValue?: number): number {
  const stringValue = validateEnvironmentVariable(name, value, required);

  if (!stringValue && !required && defaultValue !== undefined) {
    return defaultValue;
  }

  const numericValue = Number(stringValue);

  if (!Number.isInteger(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid integer, got: ${stringValue}`);
  }

  if (numericValue < 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive number, got: ${numericValue}`);
  }

  return numericValue;
}

function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return SIGNING_ALGORITHMS.some(algorithm => algorithm === value);
}

function isRefreshTokenPolicy(value: string): value is RefreshTokenPolicy {
  return value === 'rotate' || value === 'reuse';
}

function optional(name: string, value: string | undefined): string | undefined {
  return validateEnvironmentVariable(name, value, false) || undefined;
}

function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missingVars = requiredEnvVars.filter(v => !env[v]);
  if (missingVars.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missingVars.join(', ')}`);
  }

  try {
    const algorithm = validateEnvironmentVariable('JWT_ALGORITHM', env.JWT_ALGORITHM, false) || 'HS256';
    if (!isSigningAlgorithm(algorithm)) {
      throw new ConfigurationError(`JWT_ALGORITHM must be one of: ${SIGNING_ALGORITHMS.join(', ')}. Got: ${algorithm}`);
    }

    const policy = validateEnvironmentVariable('REFRESH_TOKEN_POLICY', env.REFRESH_TOKEN_POLICY, false) || 'rotate';
    if (!isRefreshTokenPolicy(policy)) {
      throw new ConfigurationError(`REFRESH_TOKEN_POLICY must be one of: rotate, reuse. Got: ${policy}`);
    }

    const config: AppConfig = {
      PORT: validateNumericEnvironmentVariable('PORT', env.PORT, false, 3000),
      NODE_ENV: validateEnvironmentVariable('NODE_ENV', env.NODE_ENV, false) || 'development',
      LOG_LEVEL: validateEnvironmentVariable('LOG_LEVEL', env.LOG_LEVEL, false) || 'info',
      MONGODB_URI: validateEnvironmentVariable('MONGODB_URI', env.MONGODB_URI),
      REDIS_URL: validateEnvironmentVariable('REDIS_URL', env.REDIS_URL),
      JWT: {
        ALGORITHM: algorithm,
        SECRET: optional('JWT_SECRET', env.JWT_SECRET),
        PRIVATE_KEY_PATH: optional('JWT_PRIVATE_KEY_PATH', env.JWT_PRIVATE_KEY_PATH),
        PUBLIC_KEY_PATH: optional('JWT_PUBLIC_KEY_PATH', env.JWT_PUBLIC_KEY_PATH),
        KEY_ID: validateEnvironmentVariable('JWT_KEY_ID', env.JWT_KEY_ID, false) || 'primary',
        PREVIOUS_SECRET: optional('JWT_PREVIOUS_SECRET', env.JWT_PREVIOUS_SECRET),
        PREVIOUS_KEY_ID: optional('JWT_PREVIOUS_KEY_ID', env.JWT_PREVIOUS_KEY_ID),
        ISSUER: validateEnvironmentVariable('JWT_ISSUER', env.JWT_ISSUER, false) || 'token-auth-service',
      },
      ACCESS_TOKEN_TTL: validateNumericEnvironmentVariable('ACCESS_TOKEN_TTL', env.ACCESS_TOKEN_TTL, false, 300), // 5 minutes
      REFRESH_TOKEN_TTL: validateNumericEnvironmentVariable('REFRESH_TOKEN_TTL', env.REFRESH_TOKEN_TTL, false, 900), // 15 minutes
      REFRESH_TOKEN_POLICY: policy,
      REVOCATION_TIMEOUT_MS: validateNumericEnvironmentVariable('REVOCATION_TIMEOUT_MS', env.REVOCATION_TIMEOUT_MS, false, 250),
      BCRYPT_ROUNDS: validateNumericEnvironmentVariable('BCRYPT_ROUNDS', env.BCRYPT_ROUNDS, false, 12),
      ALLOWED_ORIGINS: (validateEnvironmentVariable('ALLOWED_ORIGINS', env.ALLOWED_ORIGINS, false) || '')
        .split(',')
        .map(origin => origin.trim())
        .filter(origin => origin.length > 0),
    };

    if (!['development', 'production', 'test'].includes(config.NODE_ENV)) {
      throw new ConfigurationError(`NODE_ENV must be one of: development, production, test. Got: ${config.NODE_ENV}`);
    }

    if (!['error', 'warn', 'notify', 'info', 'debug'].includes(config.LOG_LEVEL)) {
      throw new ConfigurationError(`LOG_LEVEL must be one of: error, warn, notify, info, debug. Got: ${config.LOG_LEVEL}`);
    }

    if (config.PORT < 1 || config.PORT > 65535) {
      throw new ConfigurationError(`PORT must be between 1 and 65535. Got: ${config.PORT}`);
    }

    if (algorithm.startsWith('HS')) {
      if (!config.JWT.SECRET) {
        throw new ConfigurationError(`JWT_SECRET is required when JWT_ALGORITHM is ${algorithm}`);
      }
      if (config.JWT.SECRET.length < 32) {
        throw new ConfigurationError(`JWT_SECRET must be at least 32 characters long for security. Got: ${config.JWT.SECRET.length} characters`);
      }
      if (config.JWT.PREVIOUS_SECRET && !config.JWT.PREVIOUS_KEY_ID) {
        throw new ConfigurationError('JWT_PREVIOUS_KEY_ID is required when JWT_PREVIOUS_SECRET is set');
      }
      if (config.JWT.PREVIOUS_KEY_ID && config.JWT.PREVIOUS_KEY_ID === config.JWT.KEY_ID) {
        throw new ConfigurationError('JWT_PREVIOUS_KEY_ID must differ from JWT_KEY_ID');
      }
    } else if (!config.JWT.PRIVATE_KEY_PATH || !config.JWT.PUBLIC_KEY_PATH) {
      throw new ConfigurationError(`JWT_PRIVATE_KEY_PATH and JWT_PUBLIC_KEY_PATH are required when JWT_ALGORITHM is ${algorithm}`);
    }

    if (config.ACCESS_TOKEN_TTL < 60 || config.ACCESS_TOKEN_TTL > 86400) {
      throw new ConfigurationError(`ACCESS_TOKEN_TTL must be between 60 (1 minute) and 86400 (24 hours). Got: ${config.ACCESS_TOKEN_TTL}`);
    }

    if (config.REFRESH_TOKEN_TTL <= config.ACCESS_TOKEN_TTL || config.REFRESH_TOKEN_TTL > 2592000) {
      throw new ConfigurationError(`REFRESH_TOKEN_TTL must be greater than ACCESS_TOKEN_TTL and at most 2592000 (30 days). Got: ${config.REFRESH_TOKEN_TTL}`);
    }

    if (config.REVOCATION_TIMEOUT_MS < 10 || config.REVOCATION_TIMEOUT_MS > 5000) {
      throw new ConfigurationError(`REVOCATION_TIMEOUT_MS must be between 10 and 5000. Got: ${config.REVOCATION_TIMEOUT_MS}`);
    }

    if (config.BCRYPT_ROUNDS < 4 || config.BCRYPT_ROUNDS > 15) {
      throw new ConfigurationError(`BCRYPT_ROUNDS must be between 4 and 15. Got: ${config.BCRYPT_ROUNDS}`);
    }

    return config;

  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export { ConfigurationError, loadConfig };
