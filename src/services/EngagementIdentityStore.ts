import type { Pool } from 'pg';
import { logger } from '../logger.js';
import { AlreadyLinkedError, NotFoundError } from '../lib/errors.js';
import { systemClock, type Clock, type EngagementIdentity, type LiveSession } from '../lib/types.js';
import type { Queryable } from '../db/client.js';
import { hasSqlState } from '../utils/error-handlers.js';
import { toDate } from './SubmissionStore.js';

type IdentityRow = {
  handle: string;
  linked_submitter_id: string | null;
  lifetime_points: number | string;
  first_seen_at: Date | string;
  linked_at: Date | string | null;
};

type SessionRow = {
  session_id: string;
  host_identity: string;
  started_at: Date | string;
  ended_at: Date | string | null;
};

const UNIQUE_VIOLATION = '23505';

function mapIdentity(row: IdentityRow): EngagementIdentity {
  return {
    handle: row.handle,
    linkedSubmitterId: row.linked_submitter_id,
    lifetimePoints: Number(row.lifetime_points),
    firstSeenAt: toDate(row.first_seen_at),
    linkedAt: row.linked_at === null ? null : toDate(row.linked_at),
  };
}

function mapSession(row: SessionRow): LiveSession {
  return {
    sessionId: row.session_id,
    hostIdentity: row.host_identity,
    startedAt: toDate(row.started_at),
    endedAt: row.ended_at === null ? null : toDate(row.ended_at),
  };
}

/**
 * Engagement identities and live session records. Handles passed in are
 * expected to be normalized already.
 */
export class EngagementIdentityStore {
  private readonly clock: Clock;

  constructor(private readonly pool: Pool, clock: Clock = systemClock) {
    this.clock = clock;
  }

  async findIdentity(handle: string): Promise<EngagementIdentity | null> {
    const result = await this.pool.query<IdentityRow>(
      'SELECT * FROM engagement_identities WHERE handle = $1',
      [handle]
    );
    return result.rows.length > 0 ? mapIdentity(result.rows[0]) : null;
  }

  /**
   * Records that `handle` was seen and adds `points` to its lifetime balance.
   * Pass a transaction client as `db` to commit the points with other writes.
   */
  async recordActivity(handle: string, points: number, db?: Queryable): Promise<EngagementIdentity> {
    const runner = db ?? this.pool;
    const updated = await this.addLifetimePoints(handle, points, runner);
    if (updated) {
      return updated;
    }

    try {
      const inserted = await runner.query<IdentityRow>(
        `INSERT INTO engagement_identities (handle, lifetime_points, first_seen_at)
         VALUES ($1, $2, $3) RETURNING *`,
        [handle, points, this.clock()]
      );
      return mapIdentity(inserted.rows[0]);
    } catch (error) {
      // A failed INSERT aborts the caller's transaction; only retry on the pool.
      if (db || !hasSqlState(error) || error.code !== UNIQUE_VIOLATION) {
        throw error;
      }
      const raced = await this.addLifetimePoints(handle, points, this.pool);
      if (!raced) {
        throw error;
      }
      return raced;
    }
  }

  /**
   * Binds `handle` to `submitterId`. Returns false when it was already bound
   * to the same submitter.
   */
  async link(handle: string, submitterId: string): Promise<boolean> {
    const claimed = await this.pool.query<{ handle: string }>(
      `UPDATE engagement_identities SET linked_submitter_id = $1, linked_at = $2
       WHERE handle = $3 AND linked_submitter_id IS NULL RETURNING handle`,
      [submitterId, this.clock(), handle]
    );
    if (claimed.rows.length === 1) {
      logger.info('Engagement handle linked', { handle, submitterId });
      return true;
    }

    const existing = await this.findIdentity(handle);
    if (!existing) {
      throw new NotFoundError('identity', handle);
    }
    if (existing.linkedSubmitterId !== submitterId) {
      throw new AlreadyLinkedError(handle);
    }
    return false;
  }

  async unlink(handle: string, submitterId: string): Promise<void> {
    const result = await this.pool.query<{ handle: string }>(
      `UPDATE engagement_identities SET linked_submitter_id = NULL, linked_at = NULL
       WHERE handle = $1 AND linked_submitter_id = $2 RETURNING handle`,
      [handle, submitterId]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('identity', handle);
    }
    logger.info('Engagement handle unlinked', { handle, submitterId });
  }

  /** Most recently linked first. */
  async listLinked(submitterId: string): Promise<EngagementIdentity[]> {
    const result = await this.pool.query<IdentityRow>(
      `SELECT * FROM engagement_identities WHERE linked_submitter_id = $1
       ORDER BY linked_at DESC, handle ASC`,
      [submitterId]
    );
    return result.rows.map(mapIdentity);
  }

  async latestLinkedHandle(submitterId: string): Promise<string | null> {
    const [latest] = await this.listLinked(submitterId);
    return latest?.handle ?? null;
  }

  async resetLifetimePoints(submitterId: string): Promise<number> {
    const result = await this.pool.query<{ handle: string }>(
      `UPDATE engagement_identities SET lifetime_points = 0
       WHERE linked_submitter_id = $1 RETURNING handle`,
      [submitterId]
    );
    return result.rows.length;
  }

  /** Returns null when `sessionId` was used before; sessions are one-shot. */
  async openSession(sessionId: string, hostIdentity: string): Promise<LiveSession | null> {
    const existing = await this.pool.query<SessionRow>(
      'SELECT * FROM live_sessions WHERE session_id = $1',
      [sessionId]
    );
    if (existing.rows.length > 0) {
      return null;
    }

    try {
      const result = await this.pool.query<SessionRow>(
        `INSERT INTO live_sessions (session_id, host_identity, started_at)
         VALUES ($1, $2, $3) RETURNING *`,
        [sessionId, hostIdentity, this.clock()]
      );
      return mapSession(result.rows[0]);
    } catch (error) {
      if (hasSqlState(error) && error.code === UNIQUE_VIOLATION) {
        return null;
      }
      throw error;
    }
  }

  async closeSession(sessionId: string): Promise<LiveSession | null> {
    const result = await this.pool.query<SessionRow>(
      `UPDATE live_sessions SET ended_at = $1
       WHERE session_id = $2 AND ended_at IS NULL RETURNING *`,
      [this.clock(), sessionId]
    );
    return result.rows.length > 0 ? mapSession(result.rows[0]) : null;
  }

  /**
   * Sessions left open by a previous process cannot resume: their in-memory
   * state is gone. Closes them and returns how many there were.
   */
  async closeAbandonedSessions(): Promise<number> {
    const result = await this.pool.query<{ session_id: string }>(
      'UPDATE live_sessions SET ended_at = $1 WHERE ended_at IS NULL RETURNING session_id',
      [this.clock()]
    );
    if (result.rows.length > 0) {
      logger.warn('Closed sessions abandoned by a previous run', {
        sessionIds: result.rows.map(row => row.session_id),
      });
    }
    return result.rows.length;
  }

  private async addLifetimePoints(
    handle: string,
    points: number,
    db: Queryable
  ): Promise<EngagementIdentity | null> {
    const result = await db.query<IdentityRow>(
      `UPDATE engagement_identities SET lifetime_points = lifetime_points + $1
       WHERE handle = $2 RETURNING *`,
      [points, handle]
    );
    return result.rows.length > 0 ? mapIdentity(result.rows[0]) : null;
  }
}
