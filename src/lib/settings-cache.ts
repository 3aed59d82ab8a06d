import type { Pool } from 'pg';
import { logger } from '../logger.js';

export const SettingKey = {
  STANDARD_INTAKE_OPEN: 'standard_intake_open',
  SESSION_SUMMARY_CHANNEL_ID: 'session_summary_channel_id',
} as const;

export type SettingKey = (typeof SettingKey)[keyof typeof SettingKey];

type SettingRow = { setting_key: string; setting_value: string | null };

/**
 * Read-through cache over the `bot_settings` table. `load()` replaces the
 * whole cache; `invalidate(key)` drops one entry so the next read goes to
 * the database.
 */
export class SettingsCache {
  private readonly values = new Map<string, string | null>();
  private loaded = false;

  constructor(private readonly pool: Pool) {}

  async load(): Promise<void> {
    const result = await this.pool.query<SettingRow>('SELECT setting_key, setting_value FROM bot_settings');
    this.values.clear();
    for (const row of result.rows) {
      this.values.set(row.setting_key, row.setting_value);
    }
    this.loaded = true;
    logger.debug('Settings loaded', { count: result.rows.length });
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  async get(key: SettingKey): Promise<string | null> {
    if (this.values.has(key)) {
      return this.values.get(key) ?? null;
    }

    const result = await this.pool.query<SettingRow>(
      'SELECT setting_key, setting_value FROM bot_settings WHERE setting_key = $1',
      [key]
    );
    const value = result.rows.length > 0 ? result.rows[0].setting_value : null;
    this.values.set(key, value);
    return value;
  }

  async set(key: SettingKey, value: string | null): Promise<void> {
    const updated = await this.pool.query<{ setting_key: string }>(
      'UPDATE bot_settings SET setting_value = $1 WHERE setting_key = $2 RETURNING setting_key',
      [value, key]
    );
    if (updated.rows.length === 0) {
      await this.pool.query('INSERT INTO bot_settings (setting_key, setting_value) VALUES ($1, $2)', [key, value]);
    }
    this.values.set(key, value);
    logger.info('Setting updated', { key });
  }

  invalidate(key: SettingKey): void {
    this.values.delete(key);
  }

  async getFlag(key: SettingKey, defaultValue: boolean): Promise<boolean> {
    const value = await this.get(key);
    if (value === null) {
      return defaultValue;
    }
    return value === '1' || value.toLowerCase() === 'true';
  }
}
