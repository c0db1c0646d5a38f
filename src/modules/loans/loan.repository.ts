/**
 * BNPL Credit Protocol - Loan Repository
 * PostgreSQL persistence for loan records and active-loan pointers
 */

import { z } from 'zod';
import { PersistenceSession } from '../../core/runtime';
import { decodeRows, storedAddress, storedAmount, storedInteger, storedSeconds } from '../../database/rows';
import { Address, Loan } from '../../shared/types';

const loanRow = z.object({
  id: storedInteger.positive(),
  borrower: storedAddress,
  merchant: storedAddress,
  principal: storedAmount,
  fee: storedAmount,
  created_at: storedSeconds,
  due_at: storedSeconds,
  state: z.enum(['ACTIVE', 'REPAID', 'DEFAULTED']),
  repaid_at: storedSeconds.nullable(),
  defaulted_at: storedSeconds.nullable(),
});

const activeLoanRow = z.object({
  borrower: storedAddress,
  loan_id: storedInteger.nonnegative(),
});

export class LoanRepository {
  constructor(private readonly db: PersistenceSession) {}

  async loadLoans(): Promise<Loan[]> {
    const result = await this.db.query(
      `SELECT id, borrower, merchant, principal, fee, created_at, due_at, state, repaid_at, defaulted_at
       FROM bnpl_loans ORDER BY id ASC`
    );
    return decodeRows(loanRow, result.rows, 'bnpl_loans').map((row) => ({
      id: row.id,
      borrower: row.borrower,
      merchant: row.merchant,
      principal: row.principal,
      fee: row.fee,
      createdAt: row.created_at,
      dueAt: row.due_at,
      state: row.state,
      repaidAt: row.repaid_at,
      defaultedAt: row.defaulted_at,
    }));
  }

  async loadActivePointers(): Promise<Array<[Address, number]>> {
    const result = await this.db.query(`SELECT borrower, loan_id FROM bnpl_active_loans`);
    return decodeRows(activeLoanRow, result.rows, 'bnpl_active_loans').map((row) => [row.borrower, row.loan_id]);
  }

  async saveLoan(session: PersistenceSession, loan: Loan): Promise<void> {
    await session.query(
      `INSERT INTO bnpl_loans (id, borrower, merchant, principal, fee, created_at, due_at, state, repaid_at, defaulted_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (id) DO UPDATE SET
         state = EXCLUDED.state,
         repaid_at = EXCLUDED.repaid_at,
         defaulted_at = EXCLUDED.defaulted_at`,
      [
        loan.id,
        loan.borrower,
        loan.merchant,
        loan.principal.toString(),
        loan.fee.toString(),
        loan.createdAt,
        loan.dueAt,
        loan.state,
        loan.repaidAt,
        loan.defaultedAt,
      ]
    );
  }

  async saveActivePointer(session: PersistenceSession, borrower: Address, loanId: number): Promise<void> {
    await session.query(
      `INSERT INTO bnpl_active_loans (borrower, loan_id, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (borrower) DO UPDATE SET loan_id = EXCLUDED.loan_id, updated_at = NOW()`,
      [borrower, loanId]
    );
  }
}
