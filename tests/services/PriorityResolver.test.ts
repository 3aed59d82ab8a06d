import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { Pool } from 'pg';
import type Redis from 'ioredis';
import { TransientError } from '../../src/lib/errors.js';
import { QueueEvents } from '../../src/lib/queue-events.js';
import { Tier } from '../../src/lib/tiers.js';
import { PriorityResolver, TAKE_NEXT_LOCK_KEY } from '../../src/services/PriorityResolver.js';
import { SubmissionStore } from '../../src/services/SubmissionStore.js';
import { DistributedLock } from '../../src/utils/distributed-lock.js';
import { createTestPool, sequentialPublicIds, steppingClock } from '../helpers/test-db.js';
import { submissionFieldsFactory, submitterFactory } from '../factories/submission.js';
import { mockRedisFactory } from '../factories/redis.js';

jest.mock('../../src/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('PriorityResolver', () => {
  let pool: Pool;
  let store: SubmissionStore;
  let resolver: PriorityResolver;

  beforeEach(async () => {
    pool = await createTestPool();
    store = new SubmissionStore(pool, new QueueEvents(), {
      clock: steppingClock(),
      publicIdGenerator: sequentialPublicIds(),
    });
    resolver = new PriorityResolver(store);
  });

  afterEach(async () => {
    await pool.end();
  });

  async function submitInto(tier: Tier): Promise<string> {
    const created = await store.create(submitterFactory.build(), submissionFieldsFactory.build());
    if (tier !== Tier.STANDARD) {
      await store.move(created.publicId, tier);
    }
    return created.publicId;
  }

  it('returns null when every dispatch tier is empty', async () => {
    await submitInto(Tier.PENDING_APPROVAL);

    await expect(resolver.takeNext()).resolves.toBeNull();
    await expect(resolver.peekNext()).resolves.toBeNull();
  });

  it('serves higher tiers first and archives what it takes', async () => {
    const standard = await submitInto(Tier.STANDARD);
    const t1 = await submitInto(Tier.T1);
    const t5 = await submitInto(Tier.T5_PLUS);
    const t3 = await submitInto(Tier.T3);

    const taken: Array<[string, Tier]> = [];
    for (let i = 0; i < 4; i++) {
      const next = await resolver.takeNext();
      if (next) {
        taken.push([next.publicId, next.priorTier]);
        expect(next.tier).toBe(Tier.ARCHIVED);
      }
    }

    expect(taken).toEqual([
      [t5, Tier.T5_PLUS],
      [t3, Tier.T3],
      [t1, Tier.T1],
      [standard, Tier.STANDARD],
    ]);
    await expect(resolver.takeNext()).resolves.toBeNull();
    await expect(store.countInTier(Tier.ARCHIVED)).resolves.toBe(4);
  });

  it('never takes PendingApproval and reports how many wait there', async () => {
    await submitInto(Tier.PENDING_APPROVAL);
    await submitInto(Tier.PENDING_APPROVAL);

    await expect(resolver.pendingCount()).resolves.toBe(2);
    await expect(resolver.takeNext()).resolves.toBeNull();
  });

  it('peeks without changing anything', async () => {
    const head = await submitInto(Tier.T2);

    await expect(resolver.peekNext()).resolves.toMatchObject({ publicId: head, tier: Tier.T2 });
    await expect(resolver.peekNext()).resolves.toMatchObject({ publicId: head, tier: Tier.T2 });
  });

  it('hands a single submission to only one of two concurrent callers', async () => {
    const only = await submitInto(Tier.T4);

    const results = await Promise.all([resolver.takeNext(), resolver.takeNext()]);

    const winners = results.filter(result => result !== null);
    expect(winners).toHaveLength(1);
    expect(winners[0]?.publicId).toBe(only);
    await expect(store.countInTier(Tier.ARCHIVED)).resolves.toBe(1);
  });

  it('moves on to the next candidate after losing a claim', async () => {
    const first = await submitInto(Tier.T1);
    const second = await submitInto(Tier.T1);
    const archive = store.archiveIfInTier.bind(store);
    const spy = jest.spyOn(store, 'archiveIfInTier');
    spy.mockImplementationOnce(async (id, tier) => {
      await store.move(first, Tier.ARCHIVED);
      return archive(id, tier);
    });

    const taken = await resolver.takeNext();

    expect(taken?.publicId).toBe(second);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('gives up with a transient error when the head keeps changing', async () => {
    await submitInto(Tier.T1);
    jest.spyOn(store, 'archiveIfInTier').mockResolvedValue(null);
    resolver = new PriorityResolver(store, { maxClaimAttempts: 2 });

    await expect(resolver.takeNext()).rejects.toBeInstanceOf(TransientError);
  });

  describe('with a distributed lock', () => {
    it('takes the lock around the claim', async () => {
      const redis = mockRedisFactory.build();
      const lock = new DistributedLock(redis as unknown as Redis, () => Promise.resolve());
      resolver = new PriorityResolver(store, { lock });
      const head = await submitInto(Tier.STANDARD);

      await expect(resolver.takeNext()).resolves.toMatchObject({ publicId: head });
      expect(redis.set).toHaveBeenCalledWith(`lock:${TAKE_NEXT_LOCK_KEY}`, expect.any(String), 'PX', 5000, 'NX');
      expect(redis.eval).toHaveBeenCalledTimes(1);
    });

    it('reports a busy lock as transient', async () => {
      const redis = mockRedisFactory.build({}, { transient: { heldKeys: [`lock:${TAKE_NEXT_LOCK_KEY}`] } });
      const lock = new DistributedLock(redis as unknown as Redis, () => Promise.resolve());
      resolver = new PriorityResolver(store, { lock });
      await submitInto(Tier.STANDARD);

      await expect(resolver.takeNext()).rejects.toBeInstanceOf(TransientError);
      await expect(store.countInTier(Tier.STANDARD)).resolves.toBe(1);
    });
  });
});
