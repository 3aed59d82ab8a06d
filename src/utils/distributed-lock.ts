import { randomBytes } from 'crypto';
import type Redis from 'ioredis';
import { logger } from '../logger.js';

export interface LockOptions {
  ttlMs?: number;
  retryDelayMs?: number;
  maxRetries?: number;
}

/**
 * Runs `fn` while holding `key`. Resolves to null without calling `fn` when
 * the key stays held by someone else for every retry.
 */
export interface LockProvider {
  withLock<T>(key: string, fn: () => Promise<T>, options?: LockOptions): Promise<T | null>;
}

const RELEASE_SCRIPT = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`;

/**
 * Redis lock built on `SET NX PX` with an owner token, released through a
 * compare-and-delete script so an expired holder cannot free a newer one.
 */
export class DistributedLock implements LockProvider {
  private readonly keyPrefix = 'lock:';
  private readonly defaultTtlMs = 5000;
  private readonly defaultRetryDelayMs = 50;
  private readonly defaultMaxRetries = 10;

  constructor(
    private readonly redis: Redis,
    private readonly sleep: (ms: number) => Promise<void> = ms =>
      new Promise(resolve => setTimeout(resolve, ms))
  ) {}

  /** Resolves to the owner token, or null when the key stayed held. */
  async acquire(key: string, options: LockOptions = {}): Promise<string | null> {
    const ttlMs = options.ttlMs ?? this.defaultTtlMs;
    const retryDelayMs = options.retryDelayMs ?? this.defaultRetryDelayMs;
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    const token = this.createToken();

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const result = await this.redis.set(this.redisKey(key), token, 'PX', ttlMs, 'NX');
      if (result === 'OK') {
        logger.debug('Lock acquired', { key, ttlMs, attempts: attempt + 1 });
        return token;
      }

      if (attempt < maxRetries) {
        await this.sleep(retryDelayMs);
      }
    }

    logger.warn('Lock still held after retries', { key, maxRetries });
    return null;
  }

  /** Deletes `key` only while it still carries `token`. */
  async release(key: string, token: string): Promise<boolean> {
    try {
      const result = await this.redis.eval(RELEASE_SCRIPT, 1, this.redisKey(key), token);
      if (result === 1) {
        logger.debug('Lock released', { key });
        return true;
      }
      logger.warn('Lock expired before release', { key });
      return false;
    } catch (error) {
      logger.error('Failed to release lock', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async withLock<T>(key: string, fn: () => Promise<T>, options: LockOptions = {}): Promise<T | null> {
    const token = await this.acquire(key, options);
    if (token === null) {
      return null;
    }

    try {
      return await fn();
    } finally {
      await this.release(key, token);
    }
  }

  private redisKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private createToken(): string {
    return `${process.pid}-${Date.now()}-${randomBytes(16).toString('hex')}`;
  }
}
