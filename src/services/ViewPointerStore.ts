import type { Pool } from 'pg';
import { FatalStoreError } from '../lib/errors.js';
import { isTier, type Tier } from '../lib/tiers.js';
import { systemClock, type Clock, type ViewPointer } from '../lib/types.js';
import { toDate } from './SubmissionStore.js';

type PointerRow = {
  surface_key: string;
  tier: string;
  channel_ref: string;
  message_ref: string | null;
  current_page: number | string;
  active: boolean;
  updated_at: Date | string;
};

function mapPointer(row: PointerRow): ViewPointer {
  if (!isTier(row.tier)) {
    throw new FatalStoreError(`Unknown tier stored for surface ${row.surface_key}: ${row.tier}`);
  }
  return {
    surfaceKey: row.surface_key,
    tier: row.tier,
    channelRef: row.channel_ref,
    messageRef: row.message_ref,
    currentPage: Number(row.current_page),
    active: row.active,
    updatedAt: toDate(row.updated_at),
  };
}

export interface NewViewPointer {
  surfaceKey: string;
  tier: Tier;
  channelRef: string;
  messageRef?: string | null;
}

export class ViewPointerStore {
  constructor(private readonly pool: Pool, private readonly clock: Clock = systemClock) {}

  async list(): Promise<ViewPointer[]> {
    const result = await this.pool.query<PointerRow>(
      'SELECT * FROM view_pointers ORDER BY surface_key ASC'
    );
    return result.rows.map(mapPointer);
  }

  async find(surfaceKey: string): Promise<ViewPointer | null> {
    const result = await this.pool.query<PointerRow>(
      'SELECT * FROM view_pointers WHERE surface_key = $1',
      [surfaceKey]
    );
    return result.rows.length > 0 ? mapPointer(result.rows[0]) : null;
  }

  /** Creates or fully replaces the pointer, back at page 1 and active. */
  async register(pointer: NewViewPointer): Promise<ViewPointer> {
    await this.pool.query('DELETE FROM view_pointers WHERE surface_key = $1', [pointer.surfaceKey]);
    const result = await this.pool.query<PointerRow>(
      `INSERT INTO view_pointers (surface_key, tier, channel_ref, message_ref, current_page, active, updated_at)
       VALUES ($1, $2, $3, $4, 1, TRUE, $5) RETURNING *`,
      [pointer.surfaceKey, pointer.tier, pointer.channelRef, pointer.messageRef ?? null, this.clock()]
    );
    return mapPointer(result.rows[0]);
  }

  async remove(surfaceKey: string): Promise<boolean> {
    const result = await this.pool.query<{ surface_key: string }>(
      'DELETE FROM view_pointers WHERE surface_key = $1 RETURNING surface_key',
      [surfaceKey]
    );
    return result.rows.length > 0;
  }

  async savePublished(surfaceKey: string, messageRef: string, page: number): Promise<void> {
    await this.pool.query(
      `UPDATE view_pointers SET message_ref = $1, current_page = $2, updated_at = $3
       WHERE surface_key = $4`,
      [messageRef, page, this.clock(), surfaceKey]
    );
  }

  async setPage(surfaceKey: string, page: number): Promise<void> {
    await this.pool.query(
      'UPDATE view_pointers SET current_page = $1, updated_at = $2 WHERE surface_key = $3',
      [page, this.clock(), surfaceKey]
    );
  }

  /** Drops the message reference and parks the pointer until re-registered. */
  async deactivate(surfaceKey: string): Promise<void> {
    await this.pool.query(
      `UPDATE view_pointers SET message_ref = NULL, active = FALSE, updated_at = $1
       WHERE surface_key = $2`,
      [this.clock(), surfaceKey]
    );
  }
}
