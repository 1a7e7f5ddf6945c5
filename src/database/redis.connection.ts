import Redis, { RedisOptions } from 'ioredis';
import { logger } from '@/utils/logger';

const defaultOptions: RedisOptions = {
  maxRetriesPerRequest: 3,
  retryStrategy: (times: number) => {
    const delay = Math.min(times * 50, 2000);
    return delay;
  },
};

/**
 * Opens the connection that backs the revocation store. One per process,
 * created at startup and passed into the auth context.
 */
export const connectRedis = (url: string, options: RedisOptions = {}): Redis => {
  const client = new Redis(url, { ...defaultOptions, ...options });

  client.on('connect', () => {
    logger.info('Redis connected');
  });

  client.on('error', (err) => {
    logger.error('Redis connection error:', err);
  });

  client.on('close', () => {
    logger.info('Redis connection closed');
  });

  return client;
};

export const disconnectRedis = async (client: Redis): Promise<void> => {
  await client.quit();
};
