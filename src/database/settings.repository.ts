/**
 * BNPL Credit Protocol - Settings Repository
 * Key/value protocol settings (repayment window, fee rate, grace period)
 */

import { z } from 'zod';
import { PersistenceSession } from '../core/runtime';
import { decodeRows, storedInteger } from './rows';

export type SettingKey = 'repayment_window_days' | 'fee_rate_bps' | 'grace_period_days';

const settingRow = z.object({
  key: z.string(),
  value: storedInteger,
});

export class SettingsRepository {
  constructor(private readonly db: PersistenceSession) {}

  async load(key: SettingKey): Promise<number | null> {
    const result = await this.db.query(`SELECT key, value FROM bnpl_settings WHERE key = $1`, [key]);
    const [row] = decodeRows(settingRow, result.rows, 'bnpl_settings');
    return row ? row.value : null;
  }

  async save(session: PersistenceSession, key: SettingKey, value: number): Promise<void> {
    await session.query(
      `INSERT INTO bnpl_settings (key, value, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
      [key, value]
    );
  }
}
