/**
 * BNPL Credit Protocol - Credit Ledger Service
 * THE LIMITS: authoritative per-user credit capacity and utilization.
 *
 * INVARIANTS (never violated at any observed state):
 * 1. used <= limit
 * 2. hasActiveCredit <=> used > 0 (at most one open draw per user)
 * 3. defaulted is monotone; only admin unblock clears it
 *
 * WRITERS:
 * - Admin: setLimit, batchSetLimits, unblock
 * - Orchestrator (CREDIT_LEDGER_WRITER): useCredit, restoreCredit
 * - Default Detector (CREDIT_DEFAULT_REPORTER): markDefaulted
 */

import { AccessRoster } from '../access';
import { ProtocolRuntime, PersistenceSession, PersistentParticipant, TrackedMap } from '../runtime';
import { ProtocolError } from '../../shared/errors';
import { Address, BPS_DENOMINATOR, CreditAccount } from '../../shared/types';
import { requireAddress, requireEqualLengths, requirePositiveAmount } from '../../shared/validation';
import { CreditRepository } from './credit.repository';

export class CreditLedgerService implements PersistentParticipant {
  readonly name = 'CreditLedger';

  private readonly accounts: TrackedMap<Address, CreditAccount>;

  constructor(
    readonly address: Address,
    private readonly runtime: ProtocolRuntime,
    private readonly roster: AccessRoster,
    private readonly repository?: CreditRepository
  ) {
    this.accounts = new TrackedMap(runtime);
  }

  // ============================================
  // ADMIN
  // ============================================

  /**
   * Set a user's credit limit. Zero is invalid, not "no credit".
   */
  async setLimit(caller: Address, user: Address, limit: bigint): Promise<CreditAccount> {
    return this.runtime.execute('CreditLedger.setLimit', async () => {
      this.roster.requireAdmin(caller, 'setLimit');
      return this.applyLimit(user, limit);
    });
  }

  /**
   * Set many limits at once. The first invalid element rejects the whole batch.
   */
  async batchSetLimits(caller: Address, users: Address[], limits: bigint[]): Promise<number> {
    return this.runtime.execute('CreditLedger.batchSetLimits', async () => {
      this.roster.requireAdmin(caller, 'batchSetLimits');
      requireEqualLengths(users, limits, 'users/limits');

      for (let i = 0; i < users.length; i++) {
        this.applyLimit(users[i], limits[i]);
      }

      console.log(`[CreditLedger] Batch set ${users.length} limits`);
      return users.length;
    });
  }

  /**
   * Clear the defaulted flag. No-op for a user in good standing.
   */
  async unblock(caller: Address, user: Address): Promise<void> {
    return this.runtime.execute('CreditLedger.unblock', async () => {
      this.roster.requireAdmin(caller, 'unblock');
      requireAddress(user, 'user');

      const account = this.accounts.get(user);
      if (!account || !account.defaulted) return;

      this.accounts.set(user, { ...account, defaulted: false });
      console.log(`[CreditLedger] Unblocked ${user}`);
    });
  }

  // ============================================
  // ORCHESTRATOR
  // ============================================

  async useCredit(caller: Address, user: Address, amount: bigint): Promise<void> {
    return this.runtime.execute('CreditLedger.useCredit', async () => {
      this.roster.authorize('CREDIT_LEDGER_WRITER', caller, 'useCredit');
      requireAddress(user, 'user');
      requirePositiveAmount(amount);

      const account = this.accountOf(user);
      if (account.defaulted) {
        throw new ProtocolError('BORROWER_DEFAULTED', `User ${user} is in default`);
      }
      if (account.hasActiveCredit) {
        throw new ProtocolError('ACTIVE_LOAN_EXISTS', `User ${user} already has an active draw`);
      }
      const available = availableOf(account);
      if (amount > available) {
        throw new ProtocolError('INSUFFICIENT_CREDIT', `Requested ${amount} exceeds available credit ${available}`);
      }

      this.accounts.set(user, { ...account, used: account.used + amount, hasActiveCredit: true });
    });
  }

  async restoreCredit(caller: Address, user: Address, amount: bigint): Promise<void> {
    return this.runtime.execute('CreditLedger.restoreCredit', async () => {
      this.roster.authorize('CREDIT_LEDGER_WRITER', caller, 'restoreCredit');
      requireAddress(user, 'user');
      requirePositiveAmount(amount);

      const account = this.accountOf(user);
      if (amount > account.used) {
        throw new ProtocolError('RESTORE_EXCEEDS_USED', `Restore ${amount} exceeds used credit ${account.used}`);
      }

      const used = account.used - amount;
      this.accounts.set(user, { ...account, used, hasActiveCredit: used > 0n });
    });
  }

  // ============================================
  // DEFAULT DETECTOR
  // ============================================

  /**
   * Flag a user as defaulted. Idempotent in effect.
   */
  async markDefaulted(caller: Address, user: Address): Promise<void> {
    return this.runtime.execute('CreditLedger.markDefaulted', async () => {
      this.roster.authorize('CREDIT_DEFAULT_REPORTER', caller, 'markDefaulted');
      requireAddress(user, 'user');

      const account = this.accountOf(user);
      if (account.defaulted) return;

      this.accounts.set(user, { ...account, defaulted: true });
      console.log(`[CreditLedger] ${user} marked as defaulted`);
    });
  }

  // ============================================
  // QUERIES
  // ============================================

  getAccount(user: Address): CreditAccount {
    return this.accountOf(user);
  }

  getLimit(user: Address): bigint {
    return this.accountOf(user).limit;
  }

  getUsed(user: Address): bigint {
    return this.accountOf(user).used;
  }

  getAvailable(user: Address): bigint {
    return availableOf(this.accountOf(user));
  }

  hasActiveCredit(user: Address): boolean {
    return this.accountOf(user).hasActiveCredit;
  }

  isDefaulted(user: Address): boolean {
    return this.accountOf(user).defaulted;
  }

  /**
   * Would useCredit(user, amount) succeed right now?
   */
  isEligible(user: Address, amount: bigint): boolean {
    const account = this.accountOf(user);
    return !account.defaulted && !account.hasActiveCredit && amount <= availableOf(account);
  }

  /**
   * used / limit in basis points (0 when no limit is set)
   */
  getUtilization(user: Address): bigint {
    const account = this.accountOf(user);
    if (account.limit === 0n) return 0n;
    return (account.used * BPS_DENOMINATOR) / account.limit;
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  async hydrate(): Promise<void> {
    if (!this.repository) return;
    for (const account of await this.repository.loadAccounts()) {
      this.accounts.hydrate(account.user, account);
    }
  }

  async flush(session: PersistenceSession): Promise<void> {
    if (!this.repository) return;
    for (const [, account] of this.accounts.drainDirty()) {
      await this.repository.saveAccount(session, account);
    }
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private applyLimit(user: Address, limit: bigint): CreditAccount {
    requireAddress(user, 'user');
    if (limit <= 0n) {
      throw new ProtocolError('INVALID_LIMIT', `Credit limit for ${user} must be positive (got ${limit})`);
    }

    const account = this.accountOf(user);
    if (limit < account.used) {
      throw new ProtocolError('LIMIT_BELOW_USED', `Limit ${limit} is below used credit ${account.used} for ${user}`);
    }

    const updated: CreditAccount = { ...account, limit };
    this.accounts.set(user, updated);
    return updated;
  }

  private accountOf(user: Address): CreditAccount {
    return this.accounts.get(user) ?? emptyAccount(user);
  }
}

function emptyAccount(user: Address): CreditAccount {
  return { user, limit: 0n, used: 0n, defaulted: false, hasActiveCredit: false };
}

function availableOf(account: CreditAccount): bigint {
  return account.limit > account.used ? account.limit - account.used : 0n;
}
