/**
 * BNPL Credit Protocol - Default Detector Service
 * Externally triggered checks that turn overdue loans into defaults.
 *
 * A loan is overdue once now >= dueAt + gracePeriod.
 * Processing a default:
 * 1. Credit Ledger markDefaulted (hard: failure aborts)
 * 2. Custody freeze of the borrower (best effort)
 * 3. Batch path only: notify the orchestrator (best effort)
 * 4. DEFAULT event
 */

import { AccessRoster } from '../../core/access';
import { CreditLedgerService } from '../../core/credit';
import { ProtocolRuntime, PersistenceSession, PersistentParticipant, TrackedCell } from '../../core/runtime';
import { SettingsRepository } from '../../database/settings.repository';
import { Clock } from '../../shared/clock';
import { ProtocolError } from '../../shared/errors';
import { Address, DefaultPreview, Loan, SECONDS_PER_DAY, isAddress } from '../../shared/types';
import { requireAddress, requireEqualLengths } from '../../shared/validation';
import { AssetCustody } from '../custody/custody.port';

/**
 * What the detector needs from the loan book
 */
export interface LoanRegistry {
  getLoan(loanId: number): Loan | null;
  markBNPLAsDefaulted(caller: Address, borrower: Address, loanId: number): Promise<void>;
}

export interface DetectorWiring {
  loans?: LoanRegistry;
  creditLedger?: CreditLedgerService;
  custody?: AssetCustody;
}

export interface DefaultDetectorOptions {
  address: Address;
  runtime: ProtocolRuntime;
  roster: AccessRoster;
  clock: Clock;
  gracePeriodDays: number;
  settingsRepository?: SettingsRepository;
}

type IneligibleReason = Extract<DefaultPreview, { eligible: false }>['reason'];

interface Collaborators {
  loans: LoanRegistry;
  credit: CreditLedgerService;
}

export class DefaultDetectorService implements PersistentParticipant {
  readonly name = 'DefaultDetector';
  readonly address: Address;

  private readonly runtime: ProtocolRuntime;
  private readonly roster: AccessRoster;
  private readonly clock: Clock;
  private readonly settingsRepository?: SettingsRepository;
  private readonly gracePeriodDays: TrackedCell<number>;

  private loans: LoanRegistry | null = null;
  private creditLedger: CreditLedgerService | null = null;
  private custody: AssetCustody | null = null;

  constructor(options: DefaultDetectorOptions) {
    validateGracePeriod(options.gracePeriodDays);
    this.address = options.address;
    this.runtime = options.runtime;
    this.roster = options.roster;
    this.clock = options.clock;
    this.settingsRepository = options.settingsRepository;
    this.gracePeriodDays = new TrackedCell(options.runtime, options.gracePeriodDays);
  }

  /**
   * Check one loan. Returns true when it was newly processed as a default,
   * false when it is repaid or the user is already defaulted.
   * Does not notify the orchestrator.
   */
  async checkAndProcessDefault(caller: Address, user: Address, loanId: number): Promise<boolean> {
    return this.runtime.execute('DefaultDetector.checkAndProcessDefault', async () => {
      this.roster.authorizeAdminOr('DEFAULT_CHECK_CALLER', caller, 'checkAndProcessDefault');
      requireAddress(user, 'user');
      const collaborators = this.requireCollaborators();

      const preview = this.evaluate(collaborators, user, loanId);
      if (!preview.eligible) {
        return rejectOrSkip(preview.reason, user, loanId);
      }

      await this.processDefault(collaborators, user, loanId, preview.overdueAmount, preview.daysOverdue);
      return true;
    });
  }

  /**
   * Check many (user, loanId) pairs. Ineligible pairs are skipped.
   * Returns how many were processed as defaults.
   */
  async batchCheckDefaults(caller: Address, users: Address[], loanIds: number[]): Promise<number> {
    return this.runtime.execute('DefaultDetector.batchCheckDefaults', async () => {
      this.roster.authorizeAdminOr('DEFAULT_CHECK_CALLER', caller, 'batchCheckDefaults');
      requireEqualLengths(users, loanIds, 'users/loanIds');
      const collaborators = this.requireCollaborators();

      let processed = 0;
      for (let i = 0; i < users.length; i++) {
        const user = users[i];
        const loanId = loanIds[i];
        if (!isAddress(user)) continue;

        const preview = this.evaluate(collaborators, user, loanId);
        if (!preview.eligible) continue;

        await this.processDefault(collaborators, user, loanId, preview.overdueAmount, preview.daysOverdue);
        await this.runtime.attempt(`DefaultDetector.notify(${loanId})`, () =>
          collaborators.loans.markBNPLAsDefaulted(this.address, user, loanId)
        );
        processed++;
      }

      console.log(`[DefaultDetector] Batch processed ${processed}/${users.length} defaults`);
      return processed;
    });
  }

  /**
   * Read-only view of what a check would do right now
   */
  previewDefault(user: Address, loanId: number): DefaultPreview {
    return this.evaluate(this.requireCollaborators(), user, loanId);
  }

  // ============================================
  // ADMIN
  // ============================================

  async setGracePeriod(caller: Address, days: number): Promise<void> {
    return this.runtime.execute('DefaultDetector.setGracePeriod', async () => {
      this.roster.requireAdmin(caller, 'setGracePeriod');
      validateGracePeriod(days);
      this.gracePeriodDays.set(days);
      console.log(`[DefaultDetector] Grace period set to ${days} days`);
    });
  }

  getGracePeriod(): number {
    return this.gracePeriodDays.get();
  }

  async wire(caller: Address, wiring: DetectorWiring): Promise<void> {
    return this.runtime.execute('DefaultDetector.wire', async () => {
      this.roster.requireAdmin(caller, 'wire');

      if (wiring.loans) this.loans = wiring.loans;
      if (wiring.creditLedger) this.creditLedger = wiring.creditLedger;
      if (wiring.custody) this.custody = wiring.custody;

      console.log(`[DefaultDetector] Wired: ${Object.keys(wiring).join(', ') || 'nothing'}`);
    });
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  async hydrate(): Promise<void> {
    if (!this.settingsRepository) return;
    const stored = await this.settingsRepository.load('grace_period_days');
    if (stored !== null) {
      this.gracePeriodDays.hydrate(stored);
    }
  }

  async flush(session: PersistenceSession): Promise<void> {
    const days = this.gracePeriodDays.drainDirty();
    if (days !== null && this.settingsRepository) {
      await this.settingsRepository.save(session, 'grace_period_days', days);
    }
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private evaluate({ loans, credit }: Collaborators, user: Address, loanId: number): DefaultPreview {
    const loan = loans.getLoan(loanId);
    if (!loan) return { eligible: false, reason: 'LOAN_NOT_FOUND' };
    if (loan.borrower !== user) return { eligible: false, reason: 'LOAN_BORROWER_MISMATCH' };
    if (loan.state === 'REPAID') return { eligible: false, reason: 'ALREADY_REPAID' };

    const now = this.clock.now();
    if (now < loan.dueAt + this.gracePeriodDays.get() * SECONDS_PER_DAY) {
      return { eligible: false, reason: 'NOT_OVERDUE' };
    }
    if (credit.isDefaulted(user)) return { eligible: false, reason: 'ALREADY_DEFAULTED' };

    return {
      eligible: true,
      daysOverdue: Math.floor((now - loan.dueAt) / SECONDS_PER_DAY),
      overdueAmount: loan.principal,
    };
  }

  private async processDefault(
    { credit }: Collaborators,
    user: Address,
    loanId: number,
    overdueAmount: bigint,
    daysOverdue: number
  ): Promise<void> {
    await credit.markDefaulted(this.address, user);

    const custody = this.custody;
    if (custody) {
      await this.runtime.attempt(`DefaultDetector.freeze(${user})`, () => custody.freeze(this.address, user));
    }

    this.runtime.emit({
      type: 'DEFAULT',
      user,
      loanId,
      overdueAmount,
      daysOverdue,
      time: this.clock.now(),
    });
    console.log(`[DefaultDetector] Loan ${loanId} of ${user} defaulted: ${daysOverdue} days overdue, ${overdueAmount} owed`);
  }

  private requireCollaborators(): Collaborators {
    if (!this.loans || !this.creditLedger) {
      throw new ProtocolError('NOT_WIRED', 'Default detector is not wired to the loan book and credit ledger');
    }
    return { loans: this.loans, credit: this.creditLedger };
  }
}

/**
 * Single-item path: hard errors for bad input and early checks,
 * false for loans that need no processing.
 */
function rejectOrSkip(reason: IneligibleReason, user: Address, loanId: number): boolean {
  switch (reason) {
    case 'LOAN_NOT_FOUND':
      throw new ProtocolError('LOAN_NOT_FOUND', `Loan ${loanId} not found`);
    case 'LOAN_BORROWER_MISMATCH':
      throw new ProtocolError('LOAN_BORROWER_MISMATCH', `Loan ${loanId} does not belong to ${user}`);
    case 'NOT_OVERDUE':
      throw new ProtocolError('NOT_OVERDUE', `Loan ${loanId} is not past its grace period`);
    case 'ALREADY_REPAID':
    case 'ALREADY_DEFAULTED':
      return false;
  }
}

function validateGracePeriod(days: number): void {
  if (!Number.isSafeInteger(days) || days < 0) {
    throw new ProtocolError('INVALID_SETTING', `Grace period must be a non-negative whole number of days (got ${days})`);
  }
}
