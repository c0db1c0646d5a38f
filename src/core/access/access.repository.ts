/**
 * BNPL Credit Protocol - Access Roster Repository
 * PostgreSQL persistence for the permission table
 */

import { z } from 'zod';
import { PersistenceSession } from '../runtime';
import { decodeRows, storedAddress } from '../../database/rows';
import { Address } from '../../shared/types';
import { Capability, isCapability } from './capabilities';

const rosterRow = z.object({
  role: z.string(),
  holder: storedAddress,
});

export interface StoredRoster {
  admin: Address | null;
  grants: Array<[Capability, Address]>;
}

export class AccessRepository {
  constructor(private readonly db: PersistenceSession) {}

  async load(): Promise<StoredRoster> {
    const result = await this.db.query(`SELECT role, holder FROM bnpl_access_roster`);
    const roster: StoredRoster = { admin: null, grants: [] };

    for (const { role, holder } of decodeRows(rosterRow, result.rows, 'bnpl_access_roster')) {
      if (role === 'ADMIN') {
        roster.admin = holder;
      } else if (isCapability(role)) {
        roster.grants.push([role, holder]);
      }
    }

    return roster;
  }

  async saveHolder(session: PersistenceSession, role: Capability | 'ADMIN', holder: Address): Promise<void> {
    await session.query(
      `INSERT INTO bnpl_access_roster (role, holder, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (role) DO UPDATE SET holder = EXCLUDED.holder, updated_at = NOW()`,
      [role, holder]
    );
  }
}
