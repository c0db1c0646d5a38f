/**
 * BNPL Credit Protocol - Loan Orchestrator Service
 *
 * The PRIMARY entry point for borrowers.
 * Owns loan records, the one-active-loan pointer per borrower and the
 * loan settings, and drives the Credit and Liquidity Ledgers.
 *
 * LIFECYCLE: ACTIVE -> REPAID | DEFAULTED
 * A DEFAULTED loan may still be repaid; it then becomes REPAID and keeps
 * defaultedAt as history.
 */

import { AccessRoster } from '../../core/access';
import { CreditLedgerService } from '../../core/credit';
import { LiquidityLedgerService } from '../../core/liquidity';
import {
  ProtocolRuntime,
  PersistenceSession,
  PersistentParticipant,
  ReentrancyGuard,
  TrackedCell,
  TrackedMap,
} from '../../core/runtime';
import { SettingsRepository } from '../../database/settings.repository';
import { Clock } from '../../shared/clock';
import { ProtocolError, describeError } from '../../shared/errors';
import {
  Address,
  BPS_DENOMINATOR,
  EligibilityResult,
  Loan,
  LoanPreview,
  LoanSettings,
  SECONDS_PER_DAY,
} from '../../shared/types';
import { requireAddress, requirePositiveAmount } from '../../shared/validation';
import { AssetCustody } from '../custody/custody.port';
import { DefaultDetectorService } from '../defaults/default-detector.service';
import { LoanRepository } from './loan.repository';

export const MAX_FEE_RATE_BPS = 10_000;

export interface OrchestratorWiring {
  creditLedger?: CreditLedgerService;
  liquidityLedger?: LiquidityLedgerService;
  defaultDetector?: DefaultDetectorService;
  custody?: AssetCustody;
}

export interface LoanOrchestratorOptions {
  address: Address;
  runtime: ProtocolRuntime;
  roster: AccessRoster;
  clock: Clock;
  settings: LoanSettings;
  loanRepository?: LoanRepository;
  settingsRepository?: SettingsRepository;
}

export class LoanOrchestratorService implements PersistentParticipant {
  readonly name = 'LoanOrchestrator';
  readonly address: Address;

  private readonly runtime: ProtocolRuntime;
  private readonly roster: AccessRoster;
  private readonly clock: Clock;
  private readonly loanRepository?: LoanRepository;
  private readonly settingsRepository?: SettingsRepository;

  private readonly loans: TrackedMap<number, Loan>;
  private readonly activeLoans: TrackedMap<Address, number>;
  private readonly nextLoanId: TrackedCell<number>;
  private readonly settings: TrackedCell<LoanSettings>;
  private readonly guard = new ReentrancyGuard('LoanOrchestrator');

  private creditLedger: CreditLedgerService | null = null;
  private liquidityLedger: LiquidityLedgerService | null = null;
  private defaultDetector: DefaultDetectorService | null = null;
  private custody: AssetCustody | null = null;

  constructor(options: LoanOrchestratorOptions) {
    validateWindow(options.settings.repaymentWindowDays);
    validateFeeRate(options.settings.feeRateBps);

    this.address = options.address;
    this.runtime = options.runtime;
    this.roster = options.roster;
    this.clock = options.clock;
    this.loanRepository = options.loanRepository;
    this.settingsRepository = options.settingsRepository;

    this.loans = new TrackedMap(options.runtime);
    this.activeLoans = new TrackedMap(options.runtime);
    this.nextLoanId = new TrackedCell(options.runtime, 1);
    this.settings = new TrackedCell(options.runtime, options.settings);
  }

  // ============================================
  // BORROWER OPERATIONS
  // ============================================

  /**
   * Open a loan: draw credit, pay the merchant net of fee, book the fee.
   * Only the borrower may open their own loan. All or nothing.
   */
  async createLoan(caller: Address, borrower: Address, merchant: Address, amount: bigint): Promise<Loan> {
    return this.runtime.execute('LoanOrchestrator.createLoan', () =>
      this.guard.run(async () => {
        requireAddress(caller, 'caller');
        requirePositiveAmount(amount);
        requireAddress(borrower, 'borrower');
        requireAddress(merchant, 'merchant');
        if (caller !== borrower) {
          throw new ProtocolError('NOT_BORROWER', `Caller ${caller} cannot open a loan for borrower ${borrower}`);
        }

        const credit = this.requireCreditLedger();
        const liquidity = this.requireLiquidityLedger();

        if (credit.isDefaulted(borrower)) {
          throw new ProtocolError('BORROWER_DEFAULTED', `Borrower ${borrower} is in default`);
        }
        if (this.getActiveLoanId(borrower) !== 0 || credit.hasActiveCredit(borrower)) {
          throw new ProtocolError('ACTIVE_LOAN_EXISTS', `Borrower ${borrower} already has an active loan`);
        }
        if (!(await this.kycPassed(borrower))) {
          throw new ProtocolError('KYC_NOT_PASSED', `Borrower ${borrower} has not passed KYC`);
        }
        const availableCredit = credit.getAvailable(borrower);
        if (amount > availableCredit) {
          throw new ProtocolError('INSUFFICIENT_CREDIT', `Requested ${amount} exceeds available credit ${availableCredit}`);
        }
        const availableLiquidity = liquidity.getAvailableLiquidity();
        if (amount > availableLiquidity) {
          throw new ProtocolError('INSUFFICIENT_LIQUIDITY', `Requested ${amount} exceeds available liquidity ${availableLiquidity}`);
        }

        const { repaymentWindowDays, feeRateBps } = this.settings.get();
        const now = this.clock.now();
        const id = this.nextLoanId.get();
        const fee = computeFee(amount, feeRateBps);

        const loan: Loan = {
          id,
          borrower,
          merchant,
          principal: amount,
          fee,
          createdAt: now,
          dueAt: now + repaymentWindowDays * SECONDS_PER_DAY,
          state: 'ACTIVE',
          repaidAt: null,
          defaultedAt: null,
        };

        this.nextLoanId.set(id + 1);
        this.loans.set(id, loan);
        this.activeLoans.set(borrower, id);

        await credit.useCredit(this.address, borrower, amount);
        await liquidity.settleMerchant(this.address, merchant, amount, id, fee);
        if (fee > 0n) {
          await liquidity.collectFees(this.address, fee);
        }

        this.runtime.emit({
          type: 'LOAN_CREATED',
          user: borrower,
          merchant,
          loanId: id,
          amount,
          dueAt: loan.dueAt,
          time: now,
        });

        console.log(`[LoanOrchestrator] Loan ${id} created: ${borrower} -> ${merchant}, principal ${amount}, fee ${fee}`);
        return loan;
      })
    );
  }

  /**
   * Repay the full principal. Only the borrower may repay.
   */
  async repayLoan(caller: Address, loanId: number): Promise<Loan> {
    return this.runtime.execute('LoanOrchestrator.repayLoan', () =>
      this.guard.run(async () => {
        const loan = this.requireLoan(loanId);
        if (loan.state === 'REPAID') {
          throw new ProtocolError('ALREADY_REPAID', `Loan ${loanId} is already repaid`);
        }
        if (caller !== loan.borrower) {
          throw new ProtocolError('NOT_BORROWER', `Caller ${caller} is not the borrower of loan ${loanId}`);
        }

        const credit = this.requireCreditLedger();
        const liquidity = this.requireLiquidityLedger();
        const now = this.clock.now();

        await liquidity.receiveRepayment(this.address, loan.borrower, loan.principal, loan.id);

        const repaid: Loan = { ...loan, state: 'REPAID', repaidAt: now };
        this.loans.set(loan.id, repaid);
        await credit.restoreCredit(this.address, loan.borrower, loan.principal);
        if (this.getActiveLoanId(loan.borrower) === loan.id) {
          this.activeLoans.set(loan.borrower, 0);
        }

        this.runtime.emit({
          type: 'REPAYMENT',
          user: loan.borrower,
          merchant: loan.merchant,
          loanId: loan.id,
          amount: loan.principal,
          time: now,
          success: true,
        });

        const late = loan.state === 'DEFAULTED' ? ' (after default)' : '';
        console.log(`[LoanOrchestrator] Loan ${loan.id} repaid by ${loan.borrower}${late}`);
        return repaid;
      })
    );
  }

  /**
   * Record a complaint against a loan. Logging only; no state changes.
   */
  async raiseDispute(caller: Address, loanId: number, reason: string): Promise<void> {
    return this.runtime.execute('LoanOrchestrator.raiseDispute', async () => {
      const loan = this.requireLoan(loanId);
      if (caller !== loan.borrower && caller !== loan.merchant) {
        throw new ProtocolError('NOT_LOAN_PARTY', `Caller ${caller} is not a party to loan ${loanId}`);
      }
      const trimmed = reason.trim();
      if (trimmed.length === 0) {
        throw new ProtocolError('INVALID_REASON', 'Dispute reason must not be empty');
      }

      this.runtime.emit({
        type: 'DISPUTE',
        user: loan.borrower,
        merchant: loan.merchant,
        loanId: loan.id,
        reason: trimmed,
        time: this.clock.now(),
      });
      console.log(`[LoanOrchestrator] Dispute on loan ${loan.id} raised by ${caller}`);
    });
  }

  // ============================================
  // DEFAULT HANDLING
  // ============================================

  /**
   * Flag a loan DEFAULTED. Default Detector only. Credit and liquidity
   * are untouched: the principal stays outstanding.
   */
  async markBNPLAsDefaulted(caller: Address, borrower: Address, loanId: number): Promise<void> {
    return this.runtime.execute('LoanOrchestrator.markBNPLAsDefaulted', async () => {
      this.roster.authorize('LOAN_DEFAULT_REPORTER', caller, 'markBNPLAsDefaulted');
      const loan = this.requireLoan(loanId);
      if (loan.borrower !== borrower) {
        throw new ProtocolError('LOAN_BORROWER_MISMATCH', `Loan ${loanId} does not belong to ${borrower}`);
      }
      if (loan.state === 'REPAID') {
        throw new ProtocolError('ALREADY_REPAID', `Loan ${loanId} is already repaid`);
      }
      if (loan.state === 'DEFAULTED') return;

      this.loans.set(loan.id, { ...loan, state: 'DEFAULTED', defaultedAt: this.clock.now() });
      console.log(`[LoanOrchestrator] Loan ${loan.id} flagged DEFAULTED`);
    });
  }

  /**
   * Keeper entry: run the single-loan default check with this
   * orchestrator as the authorized caller. Open to anyone.
   */
  async checkDefault(caller: Address, borrower: Address, loanId: number): Promise<boolean> {
    return this.runtime.execute('LoanOrchestrator.checkDefault', async () => {
      requireAddress(caller, 'caller');
      const detector = this.defaultDetector;
      if (!detector) {
        throw new ProtocolError('NOT_WIRED', 'Default detector is not wired');
      }
      return detector.checkAndProcessDefault(this.address, borrower, loanId);
    });
  }

  // ============================================
  // QUERIES
  // ============================================

  getLoan(loanId: number): Loan | null {
    return this.loans.get(loanId) ?? null;
  }

  /**
   * 0 when the borrower has no active loan
   */
  getActiveLoanId(borrower: Address): number {
    return this.activeLoans.get(borrower) ?? 0;
  }

  getLoansByBorrower(borrower: Address): Loan[] {
    return [...this.loans.values()].filter((loan) => loan.borrower === borrower).sort((a, b) => a.id - b.id);
  }

  /**
   * createLoan preconditions without KYC. Reports the first failing one.
   */
  checkEligibility(borrower: Address, amount: bigint): EligibilityResult {
    requireAddress(borrower, 'borrower');
    if (amount <= 0n) return { eligible: false, reason: 'INVALID_AMOUNT' };

    const credit = this.requireCreditLedger();
    const liquidity = this.requireLiquidityLedger();

    if (credit.isDefaulted(borrower)) return { eligible: false, reason: 'BORROWER_DEFAULTED' };
    if (this.getActiveLoanId(borrower) !== 0 || credit.hasActiveCredit(borrower)) {
      return { eligible: false, reason: 'ACTIVE_LOAN_EXISTS' };
    }
    if (amount > credit.getAvailable(borrower)) return { eligible: false, reason: 'INSUFFICIENT_CREDIT' };
    if (amount > liquidity.getAvailableLiquidity()) return { eligible: false, reason: 'INSUFFICIENT_LIQUIDITY' };

    return { eligible: true };
  }

  previewLoan(amount: bigint): LoanPreview {
    requirePositiveAmount(amount);
    const { repaymentWindowDays, feeRateBps } = this.settings.get();
    const fee = computeFee(amount, feeRateBps);

    return {
      principal: amount,
      fee,
      merchantPayout: amount - fee,
      dueAt: this.clock.now() + repaymentWindowDays * SECONDS_PER_DAY,
    };
  }

  getSettings(): LoanSettings {
    return this.settings.get();
  }

  // ============================================
  // ADMIN
  // ============================================

  async setRepaymentWindow(caller: Address, days: number): Promise<void> {
    return this.runtime.execute('LoanOrchestrator.setRepaymentWindow', async () => {
      this.roster.requireAdmin(caller, 'setRepaymentWindow');
      validateWindow(days);
      this.settings.set({ ...this.settings.get(), repaymentWindowDays: days });
      console.log(`[LoanOrchestrator] Repayment window set to ${days} days`);
    });
  }

  async setFeeRate(caller: Address, bps: number): Promise<void> {
    return this.runtime.execute('LoanOrchestrator.setFeeRate', async () => {
      this.roster.requireAdmin(caller, 'setFeeRate');
      validateFeeRate(bps);
      this.settings.set({ ...this.settings.get(), feeRateBps: bps });
      console.log(`[LoanOrchestrator] Fee rate set to ${bps} bps`);
    });
  }

  /**
   * Point the orchestrator at its collaborators. Omitted parts are kept.
   */
  async wire(caller: Address, wiring: OrchestratorWiring): Promise<void> {
    return this.runtime.execute('LoanOrchestrator.wire', async () => {
      this.roster.requireAdmin(caller, 'wire');

      if (wiring.creditLedger) this.creditLedger = wiring.creditLedger;
      if (wiring.liquidityLedger) this.liquidityLedger = wiring.liquidityLedger;
      if (wiring.defaultDetector) this.defaultDetector = wiring.defaultDetector;
      if (wiring.custody) this.custody = wiring.custody;

      console.log(`[LoanOrchestrator] Wired: ${Object.keys(wiring).join(', ') || 'nothing'}`);
    });
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  async hydrate(): Promise<void> {
    if (this.loanRepository) {
      let maxId = 0;
      for (const loan of await this.loanRepository.loadLoans()) {
        this.loans.hydrate(loan.id, loan);
        maxId = Math.max(maxId, loan.id);
      }
      this.nextLoanId.hydrate(maxId + 1);

      for (const [borrower, loanId] of await this.loanRepository.loadActivePointers()) {
        this.activeLoans.hydrate(borrower, loanId);
      }
    }

    if (this.settingsRepository) {
      const window = await this.settingsRepository.load('repayment_window_days');
      const feeRate = await this.settingsRepository.load('fee_rate_bps');
      const current = this.settings.get();
      this.settings.hydrate({
        repaymentWindowDays: window ?? current.repaymentWindowDays,
        feeRateBps: feeRate ?? current.feeRateBps,
      });
    }
  }

  async flush(session: PersistenceSession): Promise<void> {
    if (this.loanRepository) {
      for (const [, loan] of this.loans.drainDirty()) {
        await this.loanRepository.saveLoan(session, loan);
      }
      for (const [borrower, loanId] of this.activeLoans.drainDirty()) {
        await this.loanRepository.saveActivePointer(session, borrower, loanId);
      }
    }

    const settings = this.settings.drainDirty();
    if (settings && this.settingsRepository) {
      await this.settingsRepository.save(session, 'repayment_window_days', settings.repaymentWindowDays);
      await this.settingsRepository.save(session, 'fee_rate_bps', settings.feeRateBps);
    }
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private requireLoan(loanId: number): Loan {
    const loan = this.loans.get(loanId);
    if (!loan) {
      throw new ProtocolError('LOAN_NOT_FOUND', `Loan ${loanId} not found`);
    }
    return loan;
  }

  private requireCreditLedger(): CreditLedgerService {
    if (!this.creditLedger) {
      throw new ProtocolError('NOT_WIRED', 'Credit ledger is not wired');
    }
    return this.creditLedger;
  }

  private requireLiquidityLedger(): LiquidityLedgerService {
    if (!this.liquidityLedger) {
      throw new ProtocolError('NOT_WIRED', 'Liquidity ledger is not wired');
    }
    return this.liquidityLedger;
  }

  /**
   * A custody without the KYC check, or one that cannot answer, counts as passed
   */
  private async kycPassed(borrower: Address): Promise<boolean> {
    const custody = this.custody;
    if (!custody || !custody.isKycPassed) return true;

    try {
      return await custody.isKycPassed(borrower);
    } catch (error) {
      console.warn(`[LoanOrchestrator] KYC check failed for ${borrower}, treating as passed: ${describeError(error)}`);
      return true;
    }
  }
}

export function computeFee(amount: bigint, feeRateBps: number): bigint {
  return (amount * BigInt(feeRateBps)) / BPS_DENOMINATOR;
}

function validateWindow(days: number): void {
  if (!Number.isSafeInteger(days) || days <= 0) {
    throw new ProtocolError('INVALID_SETTING', `Repayment window must be a positive whole number of days (got ${days})`);
  }
}

function validateFeeRate(bps: number): void {
  if (!Number.isSafeInteger(bps) || bps < 0 || bps > MAX_FEE_RATE_BPS) {
    throw new ProtocolError('INVALID_SETTING', `Fee rate must be within 0..${MAX_FEE_RATE_BPS} bps (got ${bps})`);
  }
}
