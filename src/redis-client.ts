import Redis, { type RedisOptions } from 'ioredis';
import { config } from './config.js';
import { logger } from './logger.js';
import { sanitizeConnectionUrl } from './utils/url-sanitizer.js';

let redisClient: Redis | null = null;

/**
 * Shared Redis connection, or null when REDIS_URL is unset. Redis only
 * backs the take-next lock, so running without it is supported.
 */
export function getRedisClient(redisUrl: string | undefined = config.redisUrl): Redis | null {
  if (!redisUrl) {
    if (config.environment === 'production') {
      logger.warn('REDIS_URL not configured; take-next relies on row-level claims only');
    }
    return null;
  }

  if (redisClient) {
    return redisClient;
  }

  const redisOptions: RedisOptions = {
    connectTimeout: 10000,
    maxRetriesPerRequest: 3,
    enableOfflineQueue: true,
    lazyConnect: false,
    retryStrategy: (times: number) => {
      if (times > 10) {
        logger.error('Redis max retries exceeded', { times });
        return null;
      }
      const delay = Math.min(times * 50, 2000);
      logger.debug('Redis retry', { times, delay });
      return delay;
    },
    reconnectOnError: (err: Error) => {
      const targetErrors = ['READONLY', 'ECONNREFUSED', 'ETIMEDOUT'];
      if (targetErrors.some(target => err.message.includes(target))) {
        logger.warn('Redis reconnecting on error', { error: err.message });
        return 2;
      }
      return false;
    },
  };

  if (redisUrl.startsWith('rediss://')) {
    redisOptions.tls = {};
  }

  const client = new Redis(redisUrl, redisOptions);
  const url = sanitizeConnectionUrl(redisUrl);

  client.on('ready', () => {
    logger.info('Redis client ready', { url });
  });

  client.on('error', (err: unknown) => {
    logger.error('Redis client error', {
      error: err instanceof Error ? err.message : String(err),
      url,
    });
  });

  client.on('end', () => {
    logger.warn('Redis client connection ended', { url });
  });

  redisClient = client;
  return client;
}

export function closeRedisClient(): void {
  if (redisClient) {
    redisClient.removeAllListeners();
    redisClient.disconnect();
    redisClient = null;
    logger.info('Redis client disconnected');
  }
}
