import type { Pool } from 'pg';
import { logger } from '../logger.js';
import { withTransaction, type Queryable } from '../db/client.js';
import { DuplicateActiveSubmissionError, FatalStoreError, TransientError } from '../lib/errors.js';
import { QueueEvents } from '../lib/queue-events.js';
import { Tier, isTier, orderByClause } from '../lib/tiers.js';
import { generatePublicId } from '../lib/validation.js';
import { systemClock, type Clock, type Submission, type SubmissionFields, type Submitter } from '../lib/types.js';

type SubmissionRow = {
  id: number;
  public_id: string;
  submitter_id: string;
  submitter_name: string;
  artist: string;
  song: string;
  content_ref: string;
  tier: string;
  submitted_at: Date | string;
  played_at: Date | string | null;
  note: string | null;
  engagement_handle: string | null;
  watch_score: number | string;
  interaction_score: number | string;
  total_score: number | string;
};

type CountRow = { total: number | string };

export interface SubmissionStoreOptions {
  clock?: Clock;
  publicIdGenerator?: () => string;
  maxPublicIdAttempts?: number;
  maxMoveAttempts?: number;
}

export interface NewSubmission extends SubmissionFields {
  engagementHandle?: string | null;
}

/**
 * A transaction that other stores can write through. Signals raised inside
 * it are held back until COMMIT and dropped on rollback.
 */
export interface StoreTransaction {
  db: Queryable;
  afterCommit(signal: () => void): void;
}

const DEFAULT_MAX_PUBLIC_ID_ATTEMPTS = 20;
const DEFAULT_MAX_MOVE_ATTEMPTS = 3;

export function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

function toTier(value: string): Tier {
  if (!isTier(value)) {
    throw new FatalStoreError(`Unknown tier stored in submissions: ${value}`);
  }
  return value;
}

function mapRow(row: SubmissionRow): Submission {
  return {
    id: Number(row.id),
    publicId: row.public_id,
    submitterId: row.submitter_id,
    submitterName: row.submitter_name,
    artist: row.artist,
    song: row.song,
    contentRef: row.content_ref,
    tier: toTier(row.tier),
    submittedAt: toDate(row.submitted_at),
    playedAt: row.played_at === null ? null : toDate(row.played_at),
    note: row.note,
    engagementHandle: row.engagement_handle,
    watchScore: Number(row.watch_score),
    interactionScore: Number(row.interaction_score),
    totalScore: Number(row.total_score),
  };
}

/**
 * Durable record of every submission and its tier. Structural mutations
 * are single statements or one transaction, and each successful one emits
 * exactly one `queueChanged` after it has committed.
 */
export class SubmissionStore {
  private readonly clock: Clock;
  private readonly nextPublicId: () => string;
  private readonly maxPublicIdAttempts: number;
  private readonly maxMoveAttempts: number;
  private readonly intakeBySubmitter = new Map<string, Promise<void>>();

  constructor(
    private readonly pool: Pool,
    private readonly events: QueueEvents,
    options: SubmissionStoreOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.nextPublicId = options.publicIdGenerator ?? generatePublicId;
    this.maxPublicIdAttempts = options.maxPublicIdAttempts ?? DEFAULT_MAX_PUBLIC_ID_ATTEMPTS;
    this.maxMoveAttempts = options.maxMoveAttempts ?? DEFAULT_MAX_MOVE_ATTEMPTS;
  }

  /**
   * Inserts a Standard submission. Creates for the same submitter are
   * serialised, in this process and across processes through an advisory
   * transaction lock, so the duplicate check cannot be raced.
   */
  async create(submitter: Submitter, fields: NewSubmission): Promise<Submission> {
    const submission = await this.serializeIntake(submitter.id, () => this.insertStandard(submitter, fields));

    logger.info('Submission created', {
      publicId: submission.publicId,
      submitterId: submitter.id,
      hasEngagementHandle: submission.engagementHandle !== null,
    });
    this.events.emitQueueChanged({ tiers: [Tier.STANDARD], reason: 'create', publicId: submission.publicId });
    return submission;
  }

  /**
   * Runs `fn` in one transaction. Queue and score signals raised through the
   * transaction are emitted after it commits.
   */
  async transaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const signals: Array<() => void> = [];
    const result = await withTransaction(this.pool, client =>
      fn({
        db: client,
        afterCommit: signal => {
          signals.push(signal);
        },
      })
    );
    for (const signal of signals) {
      signal();
    }
    return result;
  }

  /**
   * Moves a submission and returns the tier it held just before, or null if
   * it does not exist. Moving to the tier it already holds changes nothing.
   */
  async move(publicId: string, target: Tier, tx?: StoreTransaction): Promise<Tier | null> {
    const db = tx?.db ?? this.pool;
    for (let attempt = 1; attempt <= this.maxMoveAttempts; attempt++) {
      const current = await db.query<{ tier: string }>(
        'SELECT tier FROM submissions WHERE public_id = $1',
        [publicId]
      );
      if (current.rows.length === 0) {
        return null;
      }

      const prior = toTier(current.rows[0].tier);
      if (prior === target) {
        return prior;
      }

      const now = this.clock();
      const result = target === Tier.ARCHIVED
        ? await db.query<{ id: number }>(
          `UPDATE submissions SET tier = $1, submitted_at = $2, played_at = $2
           WHERE public_id = $3 AND tier = $4 RETURNING id`,
          [target, now, publicId, prior]
        )
        : await db.query<{ id: number }>(
          `UPDATE submissions SET tier = $1, submitted_at = $2
           WHERE public_id = $3 AND tier = $4 RETURNING id`,
          [target, now, publicId, prior]
        );

      if (result.rows.length === 1) {
        logger.info('Submission moved', { publicId, from: prior, to: target });
        this.signal(tx, () => this.events.emitQueueChanged({ tiers: [prior, target], reason: 'move', publicId }));
        return prior;
      }

      logger.debug('Submission changed tier during move, retrying', { publicId, attempt });
    }

    throw new TransientError('Submission kept changing tier during move', { publicId, target });
  }

  async remove(publicId: string): Promise<Tier | null> {
    const result = await this.pool.query<{ tier: string }>(
      'DELETE FROM submissions WHERE public_id = $1 RETURNING tier',
      [publicId]
    );
    if (result.rows.length === 0) {
      return null;
    }

    const prior = toTier(result.rows[0].tier);
    logger.info('Submission removed', { publicId, tier: prior });
    this.events.emitQueueChanged({ tiers: [prior], reason: 'remove', publicId });
    return prior;
  }

  async clearTier(tier: Tier): Promise<number> {
    const result = await this.pool.query<{ id: number }>(
      'DELETE FROM submissions WHERE tier = $1 RETURNING id',
      [tier]
    );
    const removed = result.rows.length;

    logger.info('Tier cleared', { tier, removed });
    if (removed > 0) {
      this.events.emitQueueChanged({ tiers: [tier], reason: 'clear' });
    }
    return removed;
  }

  /**
   * Archives submission `id` only if it still sits in `expectedTier`.
   * Returns null when another caller got there first.
   */
  async archiveIfInTier(id: number, expectedTier: Tier): Promise<Submission | null> {
    const now = this.clock();
    const result = await this.pool.query<SubmissionRow>(
      `UPDATE submissions SET tier = $1, submitted_at = $2, played_at = $2
       WHERE id = $3 AND tier = $4 RETURNING *`,
      [Tier.ARCHIVED, now, id, expectedTier]
    );
    if (result.rows.length === 0) {
      return null;
    }

    const archived = mapRow(result.rows[0]);
    this.events.emitQueueChanged({
      tiers: [expectedTier, Tier.ARCHIVED],
      reason: 'take-next',
      publicId: archived.publicId,
    });
    return archived;
  }

  async query(tier: Tier): Promise<Submission[]> {
    const result = await this.pool.query<SubmissionRow>(
      `SELECT * FROM submissions WHERE tier = $1 ORDER BY ${orderByClause(tier)}`,
      [tier]
    );
    return result.rows.map(mapRow);
  }

  /** Pages are 1-based. */
  async queryPage(tier: Tier, page: number, pageSize: number): Promise<Submission[]> {
    const safePage = Math.max(1, Math.floor(page));
    const offset = (safePage - 1) * pageSize;
    const result = await this.pool.query<SubmissionRow>(
      `SELECT * FROM submissions WHERE tier = $1 ORDER BY ${orderByClause(tier)} LIMIT $2 OFFSET $3`,
      [tier, pageSize, offset]
    );
    return result.rows.map(mapRow);
  }

  async first(tier: Tier): Promise<Submission | null> {
    const [head] = await this.queryPage(tier, 1, 1);
    return head ?? null;
  }

  async countInTier(tier: Tier): Promise<number> {
    const result = await this.pool.query<CountRow>(
      'SELECT COUNT(*) AS total FROM submissions WHERE tier = $1',
      [tier]
    );
    return Number(this.singleRow(result.rows, 'count tier').total);
  }

  async countActiveForSubmitterInTier(
    submitterId: string,
    tier: Tier,
    db: Queryable = this.pool
  ): Promise<number> {
    const result = await db.query<CountRow>(
      'SELECT COUNT(*) AS total FROM submissions WHERE submitter_id = $1 AND tier = $2',
      [submitterId, tier]
    );
    return Number(this.singleRow(result.rows, 'count submitter').total);
  }

  async findByPublicId(publicId: string): Promise<Submission | null> {
    const result = await this.pool.query<SubmissionRow>(
      'SELECT * FROM submissions WHERE public_id = $1',
      [publicId]
    );
    return result.rows.length > 0 ? mapRow(result.rows[0]) : null;
  }

  /** The submitter's non-archived submissions, oldest first. */
  async listForSubmitter(submitterId: string): Promise<Submission[]> {
    const result = await this.pool.query<SubmissionRow>(
      `SELECT * FROM submissions WHERE submitter_id = $1 AND tier <> $2
       ORDER BY submitted_at ASC, id ASC`,
      [submitterId, Tier.ARCHIVED]
    );
    return result.rows.map(mapRow);
  }

  /** Most recent submission that a gift reward may promote. */
  async findLatestEligibleForSubmitter(
    submitterId: string,
    tx?: StoreTransaction
  ): Promise<Submission | null> {
    const result = await (tx?.db ?? this.pool).query<SubmissionRow>(
      `SELECT * FROM submissions
       WHERE submitter_id = $1 AND (tier = $2 OR tier = $3)
       ORDER BY submitted_at DESC, id DESC LIMIT 1`,
      [submitterId, Tier.STANDARD, Tier.PENDING_APPROVAL]
    );
    return result.rows.length > 0 ? mapRow(result.rows[0]) : null;
  }

  /**
   * Adds points to every dispatchable submission carrying `handle` and
   * returns the tiers that were touched.
   */
  async addInteractionPoints(handle: string, points: number, tx?: StoreTransaction): Promise<Tier[]> {
    if (points === 0) {
      return [];
    }

    const result = await (tx?.db ?? this.pool).query<{ tier: string }>(
      `UPDATE submissions
       SET interaction_score = interaction_score + $1, total_score = total_score + $1
       WHERE engagement_handle = $2 AND tier <> $3 AND tier <> $4
       RETURNING tier`,
      [points, handle, Tier.ARCHIVED, Tier.PENDING_APPROVAL]
    );

    const tiers = [...new Set(result.rows.map(row => toTier(row.tier)))];
    if (tiers.length > 0) {
      this.signal(tx, () => this.events.emitScoresChanged({ tiers, reason: 'interaction' }));
    }
    return tiers;
  }

  /**
   * Recomputes watch score for every Standard submission from the session's
   * minutes-per-handle map in one transaction. Handles missing from the map
   * score zero. Returns the number of rows written.
   */
  async applyWatchMinutes(minutesByHandle: ReadonlyMap<string, number>): Promise<number> {
    const updated = await withTransaction(this.pool, async client => {
      const standard = await client.query<{ id: number; engagement_handle: string | null }>(
        'SELECT id, engagement_handle FROM submissions WHERE tier = $1',
        [Tier.STANDARD]
      );

      let written = 0;
      for (const row of standard.rows) {
        const minutes = row.engagement_handle ? minutesByHandle.get(row.engagement_handle) ?? 0 : 0;
        const watchScore = minutes * 1.0;
        const result = await client.query<{ id: number }>(
          `UPDATE submissions SET watch_score = $1, total_score = $1 + interaction_score
           WHERE id = $2 AND tier = $3 RETURNING id`,
          [watchScore, row.id, Tier.STANDARD]
        );
        written += result.rows.length;
      }
      return written;
    });

    logger.debug('Watch scores recomputed', { updated, viewers: minutesByHandle.size });
    if (updated > 0) {
      this.events.emitScoresChanged({ tiers: [Tier.STANDARD], reason: 'watch-time' });
    }
    return updated;
  }

  /** Attaches `handle` to the submitter's active submissions that have none. */
  async assignEngagementHandle(submitterId: string, handle: string): Promise<number> {
    const result = await this.pool.query<{ id: number }>(
      `UPDATE submissions SET engagement_handle = $1
       WHERE submitter_id = $2 AND tier <> $3 AND engagement_handle IS NULL
       RETURNING id`,
      [handle, submitterId, Tier.ARCHIVED]
    );
    return result.rows.length;
  }

  async clearEngagementHandle(submitterId: string, handle: string): Promise<number> {
    const result = await this.pool.query<{ id: number }>(
      `UPDATE submissions SET engagement_handle = NULL
       WHERE submitter_id = $1 AND engagement_handle = $2 AND tier <> $3
       RETURNING id`,
      [submitterId, handle, Tier.ARCHIVED]
    );
    return result.rows.length;
  }

  private insertStandard(submitter: Submitter, fields: NewSubmission): Promise<Submission> {
    return withTransaction(this.pool, async client => {
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`intake:${submitter.id}`]);
      const active = await this.countActiveForSubmitterInTier(submitter.id, Tier.STANDARD, client);
      if (active > 0) {
        throw new DuplicateActiveSubmissionError(submitter.id, Tier.STANDARD);
      }

      const publicId = await this.allocatePublicId(client);
      const result = await client.query<SubmissionRow>(
        `INSERT INTO submissions (
          public_id, submitter_id, submitter_name, artist, song, content_ref,
          tier, submitted_at, note, engagement_handle
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
        RETURNING *`,
        [
          publicId,
          submitter.id,
          submitter.displayName,
          fields.artist.trim(),
          fields.song.trim(),
          fields.contentRef.trim(),
          Tier.STANDARD,
          this.clock(),
          fields.note?.trim() || null,
          fields.engagementHandle ?? null,
        ]
      );
      return mapRow(this.singleRow(result.rows, 'insert submission'));
    });
  }

  private serializeIntake<T>(submitterId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.intakeBySubmitter.get(submitterId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.intakeBySubmitter.set(submitterId, tail);
    void tail.then(() => {
      if (this.intakeBySubmitter.get(submitterId) === tail) {
        this.intakeBySubmitter.delete(submitterId);
      }
    });
    return run;
  }

  private signal(tx: StoreTransaction | undefined, emit: () => void): void {
    if (tx) {
      tx.afterCommit(emit);
    } else {
      emit();
    }
  }

  private async allocatePublicId(db: Queryable): Promise<string> {
    for (let attempt = 1; attempt <= this.maxPublicIdAttempts; attempt++) {
      const candidate = this.nextPublicId();
      const taken = await db.query<{ id: number }>(
        'SELECT id FROM submissions WHERE public_id = $1',
        [candidate]
      );
      if (taken.rows.length === 0) {
        return candidate;
      }
      logger.debug('Public id collision, retrying', { candidate, attempt });
    }
    throw new FatalStoreError('Could not allocate a unique public id', undefined, {
      attempts: this.maxPublicIdAttempts,
    });
  }

  private singleRow<R>(rows: R[], operation: string): R {
    const [row] = rows;
    if (row === undefined) {
      throw new FatalStoreError(`Expected one row from ${operation}`);
    }
    return row;
  }
}
