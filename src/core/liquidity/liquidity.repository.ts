/**
 * BNPL Credit Protocol - Liquidity Repository
 * PostgreSQL persistence for the pool totals (single row)
 */

import { z } from 'zod';
import { PersistenceSession } from '../runtime';
import { decodeRows, storedAmount } from '../../database/rows';
import { LiquidityPoolState } from '../../shared/types';

const poolStateRow = z.object({
  total_liquidity: storedAmount,
  outstanding_credit: storedAmount,
  protocol_fees: storedAmount,
});

const POOL_ROW_ID = 1;

export class LiquidityRepository {
  constructor(private readonly db: PersistenceSession) {}

  async loadPoolState(): Promise<LiquidityPoolState | null> {
    const result = await this.db.query(
      `SELECT total_liquidity, outstanding_credit, protocol_fees FROM bnpl_pool_state WHERE id = $1`,
      [POOL_ROW_ID]
    );
    const [row] = decodeRows(poolStateRow, result.rows, 'bnpl_pool_state');
    if (!row) return null;

    return {
      totalLiquidity: row.total_liquidity,
      outstandingCredit: row.outstanding_credit,
      protocolFees: row.protocol_fees,
    };
  }

  async savePoolState(session: PersistenceSession, state: LiquidityPoolState): Promise<void> {
    await session.query(
      `INSERT INTO bnpl_pool_state (id, total_liquidity, outstanding_credit, protocol_fees, updated_at)
       VALUES ($1, $2, $3, $4, NOW())
       ON CONFLICT (id) DO UPDATE SET
         total_liquidity = EXCLUDED.total_liquidity,
         outstanding_credit = EXCLUDED.outstanding_credit,
         protocol_fees = EXCLUDED.protocol_fees,
         updated_at = NOW()`,
      [POOL_ROW_ID, state.totalLiquidity.toString(), state.outstandingCredit.toString(), state.protocolFees.toString()]
    );
  }
}
