import { logger } from '../logger.js';
import type { Queryable } from './client.js';

const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS submissions (
    id SERIAL PRIMARY KEY,
    public_id TEXT NOT NULL UNIQUE,
    submitter_id TEXT NOT NULL,
    submitter_name TEXT NOT NULL,
    artist TEXT NOT NULL,
    song TEXT NOT NULL,
    content_ref TEXT NOT NULL,
    tier TEXT NOT NULL,
    submitted_at TIMESTAMPTZ NOT NULL,
    played_at TIMESTAMPTZ,
    note TEXT,
    engagement_handle TEXT,
    watch_score DOUBLE PRECISION NOT NULL DEFAULT 0,
    interaction_score DOUBLE PRECISION NOT NULL DEFAULT 0,
    total_score DOUBLE PRECISION NOT NULL DEFAULT 0
  )`,
  'CREATE INDEX IF NOT EXISTS submissions_tier_idx ON submissions (tier)',
  'CREATE INDEX IF NOT EXISTS submissions_submitter_idx ON submissions (submitter_id)',
  'CREATE INDEX IF NOT EXISTS submissions_handle_idx ON submissions (engagement_handle)',
  `CREATE TABLE IF NOT EXISTS live_sessions (
    session_id TEXT PRIMARY KEY,
    host_identity TEXT NOT NULL,
    started_at TIMESTAMPTZ NOT NULL,
    ended_at TIMESTAMPTZ
  )`,
  `CREATE TABLE IF NOT EXISTS engagement_identities (
    handle TEXT PRIMARY KEY,
    linked_submitter_id TEXT,
    lifetime_points DOUBLE PRECISION NOT NULL DEFAULT 0,
    first_seen_at TIMESTAMPTZ NOT NULL,
    linked_at TIMESTAMPTZ
  )`,
  `CREATE TABLE IF NOT EXISTS view_pointers (
    surface_key TEXT PRIMARY KEY,
    tier TEXT NOT NULL,
    channel_ref TEXT NOT NULL,
    message_ref TEXT,
    current_page INTEGER NOT NULL DEFAULT 1,
    active BOOLEAN NOT NULL DEFAULT TRUE,
    updated_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS bot_settings (
    setting_key TEXT PRIMARY KEY,
    setting_value TEXT
  )`,
];

export async function initializeSchema(db: Queryable): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.query(statement);
  }
  logger.info('Database schema initialized', { statements: SCHEMA_STATEMENTS.length });
}
