import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { Pool } from 'pg';
import { DuplicateActiveSubmissionError, FatalStoreError } from '../../src/lib/errors.js';
import { QueueEvents, type QueueChange, type ScoreChange } from '../../src/lib/queue-events.js';
import { Tier } from '../../src/lib/tiers.js';
import type { Submission } from '../../src/lib/types.js';
import { SubmissionStore } from '../../src/services/SubmissionStore.js';
import {
  createTestPool,
  scriptedPublicIds,
  sequentialPublicIds,
  steppingClock,
} from '../helpers/test-db.js';
import { submissionFieldsFactory, submitterFactory } from '../factories/submission.js';

jest.mock('../../src/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('SubmissionStore', () => {
  let pool: Pool;
  let events: QueueEvents;
  let store: SubmissionStore;
  let queueChanges: QueueChange[];
  let scoreChanges: ScoreChange[];

  beforeEach(async () => {
    pool = await createTestPool();
    events = new QueueEvents();
    queueChanges = [];
    scoreChanges = [];
    events.on('queueChanged', change => queueChanges.push(change));
    events.on('scoresChanged', change => scoreChanges.push(change));
    store = new SubmissionStore(pool, events, {
      clock: steppingClock(),
      publicIdGenerator: sequentialPublicIds(),
    });
  });

  afterEach(async () => {
    await pool.end();
  });

  function submit(handle: string | null = null): Promise<Submission> {
    return store.create(submitterFactory.build(), {
      ...submissionFieldsFactory.build(),
      engagementHandle: handle,
    });
  }

  describe('create', () => {
    it('stores a trimmed Standard submission and signals the tier', async () => {
      const submitter = submitterFactory.build({ id: 'user-a', displayName: 'Alex' });

      const created = await store.create(submitter, {
        artist: '  The Band ',
        song: ' Tune ',
        contentRef: ' https://example.com/t ',
        note: '   ',
      });

      expect(created).toMatchObject({
        publicId: '000001',
        submitterId: 'user-a',
        submitterName: 'Alex',
        artist: 'The Band',
        song: 'Tune',
        contentRef: 'https://example.com/t',
        tier: Tier.STANDARD,
        note: null,
        playedAt: null,
        totalScore: 0,
      });
      expect(created.submittedAt).toEqual(new Date('2026-03-01T20:00:00.000Z'));
      expect(queueChanges).toEqual([{ tiers: [Tier.STANDARD], reason: 'create', publicId: '000001' }]);
    });

    it('refuses a second Standard submission from the same submitter', async () => {
      const submitter = submitterFactory.build();
      await store.create(submitter, submissionFieldsFactory.build());

      await expect(store.create(submitter, submissionFieldsFactory.build())).rejects.toBeInstanceOf(
        DuplicateActiveSubmissionError
      );
      await expect(store.countInTier(Tier.STANDARD)).resolves.toBe(1);
      expect(queueChanges).toHaveLength(1);
    });

    it('lets only one of two concurrent creates from the same submitter through', async () => {
      const submitter = submitterFactory.build();

      const results = await Promise.allSettled([
        store.create(submitter, submissionFieldsFactory.build()),
        store.create(submitter, submissionFieldsFactory.build()),
      ]);

      expect(results.map(result => result.status)).toEqual(['fulfilled', 'rejected']);
      const rejected = results[1];
      expect(rejected.status === 'rejected' && rejected.reason).toBeInstanceOf(DuplicateActiveSubmissionError);
      await expect(store.countActiveForSubmitterInTier(submitter.id, Tier.STANDARD)).resolves.toBe(1);
    });

    it('allows a new Standard submission once the previous one left Standard', async () => {
      const submitter = submitterFactory.build();
      const first = await store.create(submitter, submissionFieldsFactory.build());
      await store.move(first.publicId, Tier.T1);

      const second = await store.create(submitter, submissionFieldsFactory.build());

      expect(second.tier).toBe(Tier.STANDARD);
      await expect(store.countActiveForSubmitterInTier(submitter.id, Tier.STANDARD)).resolves.toBe(1);
    });

    it('retries public id allocation on collision', async () => {
      store = new SubmissionStore(pool, events, {
        clock: steppingClock(),
        publicIdGenerator: scriptedPublicIds('111111', '111111', '222222'),
      });

      const first = await submit();
      const second = await submit();

      expect(first.publicId).toBe('111111');
      expect(second.publicId).toBe('222222');
    });

    it('fails hard when every allocation attempt collides', async () => {
      store = new SubmissionStore(pool, events, {
        clock: steppingClock(),
        publicIdGenerator: scriptedPublicIds('111111'),
        maxPublicIdAttempts: 3,
      });
      await submit();

      await expect(submit()).rejects.toBeInstanceOf(FatalStoreError);
      await expect(store.countInTier(Tier.STANDARD)).resolves.toBe(1);
    });
  });

  describe('move', () => {
    it('returns the prior tier and signals both tiers', async () => {
      const created = await submit();
      queueChanges = [];

      await expect(store.move(created.publicId, Tier.T3)).resolves.toBe(Tier.STANDARD);

      const moved = await store.findByPublicId(created.publicId);
      expect(moved?.tier).toBe(Tier.T3);
      expect(moved?.submittedAt.getTime()).toBeGreaterThan(created.submittedAt.getTime());
      expect(queueChanges).toEqual([
        { tiers: [Tier.STANDARD, Tier.T3], reason: 'move', publicId: created.publicId },
      ]);
    });

    it('is a no-op when the submission already holds the target tier', async () => {
      const created = await submit();
      await store.move(created.publicId, Tier.T2);
      queueChanges = [];

      await expect(store.move(created.publicId, Tier.T2)).resolves.toBe(Tier.T2);
      expect(queueChanges).toEqual([]);
    });

    it('returns null for an unknown public id', async () => {
      await expect(store.move('999999', Tier.T1)).resolves.toBeNull();
      expect(queueChanges).toEqual([]);
    });

    it('stamps played_at when archiving', async () => {
      const created = await submit();

      await store.move(created.publicId, Tier.ARCHIVED);

      const archived = await store.findByPublicId(created.publicId);
      expect(archived?.playedAt).toEqual(new Date('2026-03-01T20:00:01.000Z'));
    });
  });

  describe('remove and clearTier', () => {
    it('removes and reports the tier it was in', async () => {
      const created = await submit();
      queueChanges = [];

      await expect(store.remove(created.publicId)).resolves.toBe(Tier.STANDARD);
      await expect(store.findByPublicId(created.publicId)).resolves.toBeNull();
      expect(queueChanges).toEqual([{ tiers: [Tier.STANDARD], reason: 'remove', publicId: created.publicId }]);
    });

    it('returns null when removing an unknown id', async () => {
      await expect(store.remove('123456')).resolves.toBeNull();
    });

    it('clears every submission in a tier and returns the count', async () => {
      for (let i = 0; i < 7; i++) {
        await submit();
      }
      queueChanges = [];

      await expect(store.clearTier(Tier.STANDARD)).resolves.toBe(7);
      await expect(store.countInTier(Tier.STANDARD)).resolves.toBe(0);
      expect(queueChanges).toEqual([{ tiers: [Tier.STANDARD], reason: 'clear' }]);
    });

    it('does not signal when clearing an empty tier', async () => {
      await expect(store.clearTier(Tier.T4)).resolves.toBe(0);
      expect(queueChanges).toEqual([]);
    });
  });

  describe('ordering', () => {
    it('orders each tier by its key', async () => {
      const a = await submit('handle.a');
      const b = await submit('handle.b');
      const c = await submit('handle.c');
      await store.addInteractionPoints('handle.b', 5);

      expect((await store.query(Tier.STANDARD)).map(s => s.publicId)).toEqual([
        b.publicId,
        a.publicId,
        c.publicId,
      ]);

      await store.move(c.publicId, Tier.T1);
      await store.move(a.publicId, Tier.T1);
      expect((await store.query(Tier.T1)).map(s => s.publicId)).toEqual([c.publicId, a.publicId]);

      await store.move(a.publicId, Tier.ARCHIVED);
      await store.move(c.publicId, Tier.ARCHIVED);
      expect((await store.query(Tier.ARCHIVED)).map(s => s.publicId)).toEqual([c.publicId, a.publicId]);
    });

    it('pages with 1-based page numbers', async () => {
      const created: Submission[] = [];
      for (let i = 0; i < 5; i++) {
        created.push(await submit());
      }

      const second = await store.queryPage(Tier.STANDARD, 2, 2);
      const beyond = await store.queryPage(Tier.STANDARD, 4, 2);
      const belowOne = await store.queryPage(Tier.STANDARD, 0, 2);

      expect(second.map(s => s.publicId)).toEqual([created[2].publicId, created[3].publicId]);
      expect(beyond).toEqual([]);
      expect(belowOne.map(s => s.publicId)).toEqual([created[0].publicId, created[1].publicId]);
      await expect(store.first(Tier.STANDARD)).resolves.toMatchObject({ publicId: created[0].publicId });
      await expect(store.first(Tier.T5_PLUS)).resolves.toBeNull();
    });
  });

  describe('archiveIfInTier', () => {
    it('archives only while the row still sits in the expected tier', async () => {
      const created = await submit();
      await store.move(created.publicId, Tier.T2);
      queueChanges = [];

      await expect(store.archiveIfInTier(created.id, Tier.STANDARD)).resolves.toBeNull();
      expect(queueChanges).toEqual([]);

      const archived = await store.archiveIfInTier(created.id, Tier.T2);
      expect(archived?.tier).toBe(Tier.ARCHIVED);
      expect(archived?.playedAt).not.toBeNull();
      expect(queueChanges).toEqual([
        { tiers: [Tier.T2, Tier.ARCHIVED], reason: 'take-next', publicId: created.publicId },
      ]);
    });
  });

  describe('scores', () => {
    it('adds interaction points to active submissions carrying the handle', async () => {
      const standard = await submit('night.owl');
      const pending = await submit('night.owl');
      await store.move(pending.publicId, Tier.PENDING_APPROVAL);
      await submit('someone.else');

      await expect(store.addInteractionPoints('night.owl', 10)).resolves.toEqual([Tier.STANDARD]);

      await expect(store.findByPublicId(standard.publicId)).resolves.toMatchObject({
        interactionScore: 10,
        totalScore: 10,
      });
      await expect(store.findByPublicId(pending.publicId)).resolves.toMatchObject({ totalScore: 0 });
      expect(scoreChanges).toEqual([{ tiers: [Tier.STANDARD], reason: 'interaction' }]);
    });

    it('holds signals raised inside a transaction until it commits', async () => {
      const submission = await submit('night.owl');
      queueChanges.length = 0;

      await store.transaction(async tx => {
        await store.addInteractionPoints('night.owl', 4, tx);
        await store.move(submission.publicId, Tier.T2, tx);
        expect(scoreChanges).toEqual([]);
        expect(queueChanges).toEqual([]);
      });

      expect(scoreChanges).toEqual([{ tiers: [Tier.STANDARD], reason: 'interaction' }]);
      expect(queueChanges).toEqual([
        { tiers: [Tier.STANDARD, Tier.T2], reason: 'move', publicId: submission.publicId },
      ]);
    });

    it('drops writes and signals when the transaction rolls back', async () => {
      const submission = await submit('night.owl');

      await expect(
        store.transaction(async tx => {
          await store.addInteractionPoints('night.owl', 4, tx);
          throw new Error('later write failed');
        })
      ).rejects.toThrow('later write failed');

      await expect(store.findByPublicId(submission.publicId)).resolves.toMatchObject({ interactionScore: 0 });
      expect(scoreChanges).toEqual([]);
    });

    it('does nothing for zero points or unknown handles', async () => {
      await submit('night.owl');

      await expect(store.addInteractionPoints('night.owl', 0)).resolves.toEqual([]);
      await expect(store.addInteractionPoints('nobody', 5)).resolves.toEqual([]);
      expect(scoreChanges).toEqual([]);
    });

    it('recomputes watch score from scratch and keeps interaction score', async () => {
      const watched = await submit('handle.a');
      const unwatched = await submit('handle.b');
      await store.addInteractionPoints('handle.a', 3);

      await expect(store.applyWatchMinutes(new Map([['handle.a', 5]]))).resolves.toBe(2);
      await expect(store.findByPublicId(watched.publicId)).resolves.toMatchObject({
        watchScore: 5,
        interactionScore: 3,
        totalScore: 8,
      });
      await expect(store.findByPublicId(unwatched.publicId)).resolves.toMatchObject({ totalScore: 0 });

      await store.applyWatchMinutes(new Map([['handle.a', 6]]));
      await expect(store.findByPublicId(watched.publicId)).resolves.toMatchObject({
        watchScore: 6,
        totalScore: 9,
      });
      expect(scoreChanges.at(-1)).toEqual({ tiers: [Tier.STANDARD], reason: 'watch-time' });
    });
  });

  describe('submitter lookups', () => {
    it('lists non-archived submissions oldest first', async () => {
      const submitter = submitterFactory.build();
      const first = await store.create(submitter, submissionFieldsFactory.build());
      await store.move(first.publicId, Tier.T4);
      const second = await store.create(submitter, submissionFieldsFactory.build());
      await store.move(second.publicId, Tier.ARCHIVED);
      const third = await store.create(submitter, submissionFieldsFactory.build());

      const listed = await store.listForSubmitter(submitter.id);

      expect(listed.map(s => s.publicId)).toEqual([first.publicId, third.publicId]);
    });

    it('finds the latest reward-eligible submission', async () => {
      const submitter = submitterFactory.build();
      const paid = await store.create(submitter, submissionFieldsFactory.build());
      await store.move(paid.publicId, Tier.T1);
      const pending = await store.create(submitter, submissionFieldsFactory.build());
      await store.move(pending.publicId, Tier.PENDING_APPROVAL);

      await expect(store.findLatestEligibleForSubmitter(submitter.id)).resolves.toMatchObject({
        publicId: pending.publicId,
      });

      const standard = await store.create(submitter, submissionFieldsFactory.build());
      await expect(store.findLatestEligibleForSubmitter(submitter.id)).resolves.toMatchObject({
        publicId: standard.publicId,
      });
      await expect(store.findLatestEligibleForSubmitter('nobody')).resolves.toBeNull();
    });

    it('assigns and clears an engagement handle on active submissions only', async () => {
      const submitter = submitterFactory.build();
      const archived = await store.create(submitter, submissionFieldsFactory.build());
      await store.move(archived.publicId, Tier.ARCHIVED);
      const active = await store.create(submitter, submissionFieldsFactory.build());

      await expect(store.assignEngagementHandle(submitter.id, 'night.owl')).resolves.toBe(1);
      await expect(store.findByPublicId(active.publicId)).resolves.toMatchObject({
        engagementHandle: 'night.owl',
      });
      await expect(store.findByPublicId(archived.publicId)).resolves.toMatchObject({ engagementHandle: null });

      await expect(store.clearEngagementHandle(submitter.id, 'night.owl')).resolves.toBe(1);
      await expect(store.findByPublicId(active.publicId)).resolves.toMatchObject({ engagementHandle: null });
    });
  });
});
