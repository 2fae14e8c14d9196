/**
 * Redis Client
 * Used for: shared API key validation cache (API_KEY_CACHE_DRIVER=redis)
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import { getRedisUrl, type Config } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('redis-client');

let redisClient: Redis | null = null;

export function createRedisClient(config: Config): Redis {
  if (redisClient) {
    return redisClient;
  }

  const options: RedisOptions = {
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      if (times > 10) {
        logger.error({ attempts: times }, 'Redis connection failed');
        return null;
      }
      const delay = Math.min(times * 200, 5000);
      logger.warn({ attempt: times, delay }, 'Redis connection retry');
      return delay;
    },
    connectTimeout: 10000,
    commandTimeout: 2000,
    lazyConnect: true,
    enableReadyCheck: true,
  };

  redisClient = new Redis(getRedisUrl(config), options);

  redisClient.on('ready', () => {
    logger.info('Redis ready');
  });

  redisClient.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Redis error');
  });

  redisClient.on('close', () => {
    logger.warn('Redis connection closed');
  });

  redisClient.on('reconnecting', (delay: number) => {
    logger.warn({ delay }, 'Redis reconnecting');
  });

  return redisClient;
}

export async function closeRedisClient(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
    logger.info('Redis closed');
  }
}

export const RedisKeys = {
  /** Cached validation result, keyed by SHA-256 of the full secret */
  apiKeyCache: (secretDigest: string) => `auth:apikey:${secretDigest}`,
  /** key id -> secret digest, so revocation can evict without the plaintext */
  apiKeyCacheIndex: (keyId: string) => `auth:apikey:id:${keyId}`,
} as const;
