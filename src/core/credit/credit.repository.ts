/**
 * BNPL Credit Protocol - Credit Repository
 * PostgreSQL persistence for credit accounts
 */

import { z } from 'zod';
import { PersistenceSession } from '../runtime';
import { decodeRows, storedAddress, storedAmount } from '../../database/rows';
import { CreditAccount } from '../../shared/types';

const creditAccountRow = z.object({
  user_address: storedAddress,
  credit_limit: storedAmount,
  used: storedAmount,
  defaulted: z.boolean(),
  has_active_credit: z.boolean(),
});

export class CreditRepository {
  constructor(private readonly db: PersistenceSession) {}

  async loadAccounts(): Promise<CreditAccount[]> {
    const result = await this.db.query(
      `SELECT user_address, credit_limit, used, defaulted, has_active_credit FROM bnpl_credit_accounts`
    );
    return decodeRows(creditAccountRow, result.rows, 'bnpl_credit_accounts').map((row) => ({
      user: row.user_address,
      limit: row.credit_limit,
      used: row.used,
      defaulted: row.defaulted,
      hasActiveCredit: row.has_active_credit,
    }));
  }

  async saveAccount(session: PersistenceSession, account: CreditAccount): Promise<void> {
    await session.query(
      `INSERT INTO bnpl_credit_accounts (user_address, credit_limit, used, defaulted, has_active_credit, updated_at)
       VALUES ($1, $2, $3, $4, $5, NOW())
       ON CONFLICT (user_address) DO UPDATE SET
         credit_limit = EXCLUDED.credit_limit,
         used = EXCLUDED.used,
         defaulted = EXCLUDED.defaulted,
         has_active_credit = EXCLUDED.has_active_credit,
         updated_at = NOW()`,
      [
        account.user,
        account.limit.toString(),
        account.used.toString(),
        account.defaulted,
        account.hasActiveCredit,
      ]
    );
  }
}
