/**
 * Application Configuration
 * Loaded once from environment variables at process start.
 * Signing material has no defaults: a missing or weak secret stops startup.
 */

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
  readonly baseUrl: string;
}

export interface PostgresConfig {
  readonly url: string;
  readonly poolMax: number;
  readonly statementTimeoutMs: number;
  readonly connectionTimeoutMs: number;
}

export interface RedisConfig {
  readonly url: string | undefined;
  readonly host: string;
  readonly port: number;
  readonly password: string | undefined;
}

export interface AuthConfig {
  readonly jwtSecret: string;
  readonly jwtIssuer: string;
  readonly jwtAudience: string;
  readonly jwtExpiresInMinutes: number;
  readonly bcryptRounds: number;
  readonly rateLimitMax: number;
}

export type ApiKeyCacheDriver = 'memory' | 'redis';

export interface ApiKeyConfig {
  /** Fixed marker in front of every secret; the codec appends the `_` separator */
  readonly prefix: string;
  /** 0 disables the validation cache */
  readonly cacheTtlSeconds: number;
  readonly cacheDriver: ApiKeyCacheDriver;
}

export interface RegistrationConfig {
  readonly allowRegistration: boolean;
}

export interface Config {
  readonly env: string;
  readonly server: ServerConfig;
  readonly postgres: PostgresConfig;
  readonly redis: RedisConfig;
  readonly auth: AuthConfig;
  readonly apiKeys: ApiKeyConfig;
  readonly registration: RegistrationConfig;
}

export const MIN_JWT_SECRET_LENGTH = 32;
export const MAX_API_KEY_CACHE_TTL_SECONDS = 300;

type Env = Record<string, string | undefined>;

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function getEnvAsIntOrDefault(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvAsBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

export function loadConfig(env: Env = process.env): Config {
  const port = getEnvAsIntOrDefault(env, 'PORT', getEnvAsIntOrDefault(env, 'SERVER_PORT', 3001));

  return {
    env: getEnvOrDefault(env, 'NODE_ENV', 'development'),
    server: {
      host: getEnvOrDefault(env, 'SERVER_HOST', '0.0.0.0'),
      port,
      baseUrl: getEnvOrDefault(env, 'APP_BASE_URL', `http://localhost:${port}`),
    },
    postgres: {
      url: getEnvOrDefault(env, 'DATABASE_URL', ''),
      poolMax: getEnvAsIntOrDefault(env, 'DATABASE_POOL_MAX', 10),
      statementTimeoutMs: getEnvAsIntOrDefault(env, 'DATABASE_STATEMENT_TIMEOUT_MS', 5000),
      connectionTimeoutMs: getEnvAsIntOrDefault(env, 'DATABASE_CONNECTION_TIMEOUT_MS', 5000),
    },
    redis: {
      url: env['REDIS_URL'],
      host: getEnvOrDefault(env, 'REDIS_HOST', 'localhost'),
      port: getEnvAsIntOrDefault(env, 'REDIS_PORT', 6379),
      password: env['REDIS_PASSWORD'],
    },
    auth: {
      jwtSecret: getEnvOrDefault(env, 'JWT_SECRET', ''),
      jwtIssuer: getEnvOrDefault(env, 'JWT_ISSUER', '').trim(),
      jwtAudience: getEnvOrDefault(env, 'JWT_AUDIENCE', '').trim(),
      jwtExpiresInMinutes: getEnvAsIntOrDefault(env, 'JWT_EXPIRES_IN_MINUTES', 60),
      bcryptRounds: getEnvAsIntOrDefault(env, 'BCRYPT_ROUNDS', 12),
      rateLimitMax: getEnvAsIntOrDefault(env, 'AUTH_RATE_LIMIT_MAX', 10),
    },
    apiKeys: {
      prefix: getEnvOrDefault(env, 'API_KEY_PREFIX', 'hk'),
      cacheTtlSeconds: getEnvAsIntOrDefault(env, 'API_KEY_CACHE_TTL_SECONDS', 30),
      cacheDriver: getEnvOrDefault(env, 'API_KEY_CACHE_DRIVER', 'memory') === 'redis' ? 'redis' : 'memory',
    },
    registration: {
      allowRegistration: getEnvAsBool(env, 'ALLOW_REGISTRATION', false),
    },
  };
}

/**
 * Validate configuration and return list of errors
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.server.port < 1 || config.server.port > 65535) {
    errors.push(`Invalid PORT: ${config.server.port}. Must be between 1 and 65535.`);
  }

  if (!config.postgres.url) {
    errors.push('DATABASE_URL is required');
  } else if (!config.postgres.url.startsWith('postgresql://') && !config.postgres.url.startsWith('postgres://')) {
    errors.push('Invalid DATABASE_URL: must start with postgresql:// or postgres://');
  }
  if (config.postgres.statementTimeoutMs < 1) {
    errors.push('DATABASE_STATEMENT_TIMEOUT_MS must be positive');
  }

  if (config.apiKeys.cacheDriver === 'redis') {
    if (!config.redis.url && !config.redis.host) {
      errors.push('REDIS_URL or REDIS_HOST is required when API_KEY_CACHE_DRIVER=redis');
    }
    if (config.redis.port < 1 || config.redis.port > 65535) {
      errors.push(`Invalid REDIS_PORT: ${config.redis.port}. Must be between 1 and 65535.`);
    }
  }

  if (!config.auth.jwtSecret) {
    errors.push('JWT_SECRET is required');
  } else if (config.auth.jwtSecret.length < MIN_JWT_SECRET_LENGTH) {
    errors.push(`JWT_SECRET must be at least ${MIN_JWT_SECRET_LENGTH} characters`);
  }
  if (!config.auth.jwtIssuer) {
    errors.push('JWT_ISSUER is required');
  }
  if (!config.auth.jwtAudience) {
    errors.push('JWT_AUDIENCE is required');
  }
  if (config.auth.jwtExpiresInMinutes < 1) {
    errors.push(`Invalid JWT_EXPIRES_IN_MINUTES: ${config.auth.jwtExpiresInMinutes}. Must be at least 1.`);
  }
  if (config.auth.bcryptRounds < 4 || config.auth.bcryptRounds > 15) {
    errors.push(`Invalid BCRYPT_ROUNDS: ${config.auth.bcryptRounds}. Must be between 4 and 15.`);
  }

  // The display prefix is 8 chars; a short marker leaves room for random characters in it
  if (!/^[a-z0-9]{2,4}$/.test(config.apiKeys.prefix)) {
    errors.push('API_KEY_PREFIX must be 2-4 lowercase letters or digits');
  }
  if (config.apiKeys.cacheTtlSeconds < 0 || config.apiKeys.cacheTtlSeconds > MAX_API_KEY_CACHE_TTL_SECONDS) {
    errors.push(
      `Invalid API_KEY_CACHE_TTL_SECONDS: ${config.apiKeys.cacheTtlSeconds}. Must be between 0 and ${MAX_API_KEY_CACHE_TTL_SECONDS}.`
    );
  }

  return errors;
}

/**
 * Get Redis URL (prefer REDIS_URL, fallback to host:port)
 */
export function getRedisUrl(config: Config): string {
  if (config.redis.url) {
    return config.redis.url;
  }
  const auth = config.redis.password ? `:${config.redis.password}@` : '';
  return `redis://${auth}${config.redis.host}:${config.redis.port}`;
}
