/**
 * BNPL Credit Protocol - Liquidity Ledger Service
 * THE POOL: shared funds, outstanding exposure and protocol fees.
 *
 * This is the ONLY component that moves custody funds. Pool funds sit in
 * the custody account named by this ledger's own address.
 *
 * ACCOUNTING:
 * - deposit:   totalLiquidity += amount
 * - settle:    totalLiquidity -= payout, outstandingCredit += principal
 *              (payout = principal - withheld fee; the borrower owes the principal)
 * - repayment: totalLiquidity += amount, outstandingCredit -= amount
 * - fees:      protocolFees += fee (funds already in custody via net settlement)
 *
 * availableLiquidity = max(totalLiquidity - outstandingCredit, 0)
 */

import { AccessRoster } from '../access';
import {
  ProtocolRuntime,
  PersistenceSession,
  PersistentParticipant,
  ReentrancyGuard,
  TrackedCell,
} from '../runtime';
import { ProtocolError } from '../../shared/errors';
import { Address, BPS_DENOMINATOR, LiquidityPoolState } from '../../shared/types';
import { requireAddress, requirePositiveAmount } from '../../shared/validation';
import { AssetCustody } from '../../modules/custody/custody.port';
import { LiquidityRepository } from './liquidity.repository';

const EMPTY_POOL: LiquidityPoolState = {
  totalLiquidity: 0n,
  outstandingCredit: 0n,
  protocolFees: 0n,
};

export class LiquidityLedgerService implements PersistentParticipant {
  readonly name = 'LiquidityLedger';

  private readonly pool: TrackedCell<LiquidityPoolState>;
  private readonly guard = new ReentrancyGuard('LiquidityLedger');

  constructor(
    readonly address: Address,
    private readonly runtime: ProtocolRuntime,
    private readonly roster: AccessRoster,
    private custody: AssetCustody,
    private readonly repository?: LiquidityRepository
  ) {
    this.pool = new TrackedCell(runtime, EMPTY_POOL);
  }

  // ============================================
  // LIQUIDITY PROVIDERS
  // ============================================

  /**
   * Pull `amount` from the caller into the pool. Open to anyone.
   */
  async depositLiquidity(caller: Address, amount: bigint): Promise<LiquidityPoolState> {
    return this.fundMovement('depositLiquidity', async () => {
      requireAddress(caller, 'caller');
      requirePositiveAmount(amount);

      await this.pull(caller, amount, 'deposit');

      const state = this.pool.get();
      this.pool.set({ ...state, totalLiquidity: state.totalLiquidity + amount });
      console.log(`[LiquidityLedger] Deposit ${amount} from ${caller}`);
      return this.pool.get();
    });
  }

  // ============================================
  // ADMIN
  // ============================================

  /**
   * Withdraw uncommitted liquidity
   */
  async withdrawLiquidity(caller: Address, amount: bigint, recipient: Address): Promise<LiquidityPoolState> {
    return this.fundMovement('withdrawLiquidity', async () => {
      this.roster.requireAdmin(caller, 'withdrawLiquidity');
      requirePositiveAmount(amount);
      requireAddress(recipient, 'recipient');

      const available = this.getAvailableLiquidity();
      if (amount > available) {
        throw new ProtocolError('INSUFFICIENT_LIQUIDITY', `Withdrawal ${amount} exceeds available liquidity ${available}`);
      }

      const state = this.pool.get();
      this.pool.set({ ...state, totalLiquidity: state.totalLiquidity - amount });
      await this.push(recipient, amount, 'liquidity withdrawal');

      console.log(`[LiquidityLedger] Withdrew ${amount} liquidity to ${recipient}`);
      return this.pool.get();
    });
  }

  async withdrawFees(caller: Address, amount: bigint, recipient: Address): Promise<LiquidityPoolState> {
    return this.fundMovement('withdrawFees', async () => {
      this.roster.requireAdmin(caller, 'withdrawFees');
      requirePositiveAmount(amount);
      requireAddress(recipient, 'recipient');

      const state = this.pool.get();
      if (amount > state.protocolFees) {
        throw new ProtocolError('INSUFFICIENT_FEES', `Fee withdrawal ${amount} exceeds collected fees ${state.protocolFees}`);
      }

      this.pool.set({ ...state, protocolFees: state.protocolFees - amount });
      await this.push(recipient, amount, 'fee withdrawal');

      console.log(`[LiquidityLedger] Withdrew ${amount} fees to ${recipient}`);
      return this.pool.get();
    });
  }

  // ============================================
  // ORCHESTRATOR
  // ============================================

  /**
   * Pay a merchant for a loan. `amount` is the loan principal; the payout
   * is principal minus the withheld fee.
   */
  async settleMerchant(
    caller: Address,
    merchant: Address,
    amount: bigint,
    loanId: number,
    withheldFee: bigint = 0n
  ): Promise<bigint> {
    return this.fundMovement('settleMerchant', async () => {
      this.roster.authorize('LIQUIDITY_LEDGER_WRITER', caller, 'settleMerchant');
      requireAddress(merchant, 'merchant');
      requirePositiveAmount(amount);
      if (withheldFee < 0n || withheldFee > amount) {
        throw new ProtocolError('INVALID_AMOUNT', `Withheld fee ${withheldFee} must be within [0, ${amount}]`);
      }

      const payout = amount - withheldFee;
      const state = this.pool.get();
      if (state.totalLiquidity < payout) {
        throw new ProtocolError('INSUFFICIENT_LIQUIDITY', `Pool holds ${state.totalLiquidity}, payout needs ${payout}`);
      }

      this.pool.set({
        ...state,
        totalLiquidity: state.totalLiquidity - payout,
        outstandingCredit: state.outstandingCredit + amount,
      });

      if (payout > 0n) {
        await this.push(merchant, payout, `merchant settlement for loan ${loanId}`);
      }

      console.log(`[LiquidityLedger] Loan ${loanId}: paid ${payout} to ${merchant} (principal ${amount})`);
      return payout;
    });
  }

  /**
   * Pull a repayment from `user` back into the pool
   */
  async receiveRepayment(caller: Address, user: Address, amount: bigint, loanId: number): Promise<void> {
    return this.fundMovement('receiveRepayment', async () => {
      this.roster.authorize('LIQUIDITY_LEDGER_WRITER', caller, 'receiveRepayment');
      requireAddress(user, 'user');
      requirePositiveAmount(amount);

      const before = this.pool.get();
      if (amount > before.outstandingCredit) {
        throw new ProtocolError('OUTSTANDING_UNDERFLOW', `Repayment ${amount} exceeds outstanding credit ${before.outstandingCredit}`);
      }

      await this.pull(user, amount, `repayment for loan ${loanId}`);

      const state = this.pool.get();
      this.pool.set({
        ...state,
        totalLiquidity: state.totalLiquidity + amount,
        outstandingCredit: state.outstandingCredit - amount,
      });
      console.log(`[LiquidityLedger] Loan ${loanId}: received ${amount} from ${user}`);
    });
  }

  /**
   * Book a fee already retained in custody by net settlement
   */
  async collectFees(caller: Address, amount: bigint): Promise<void> {
    return this.runtime.execute('LiquidityLedger.collectFees', async () => {
      this.roster.authorize('LIQUIDITY_LEDGER_WRITER', caller, 'collectFees');
      requirePositiveAmount(amount);

      const state = this.pool.get();
      this.pool.set({ ...state, protocolFees: state.protocolFees + amount });
    });
  }

  // ============================================
  // QUERIES
  // ============================================

  getPoolState(): LiquidityPoolState {
    return this.pool.get();
  }

  getAvailableLiquidity(): bigint {
    const { totalLiquidity, outstandingCredit } = this.pool.get();
    return totalLiquidity > outstandingCredit ? totalLiquidity - outstandingCredit : 0n;
  }

  /**
   * Raw custody balance of the pool account (for reconciliation)
   */
  async getCustodyBalance(): Promise<bigint> {
    return this.custody.balanceOf(this.address);
  }

  /**
   * outstandingCredit / totalLiquidity in basis points (0 for an empty pool)
   */
  getUtilization(): bigint {
    const { totalLiquidity, outstandingCredit } = this.pool.get();
    if (totalLiquidity === 0n) return 0n;
    return (outstandingCredit * BPS_DENOMINATOR) / totalLiquidity;
  }

  /**
   * Point the ledger at another custody asset (admin wiring)
   */
  async setCustody(caller: Address, custody: AssetCustody): Promise<void> {
    return this.runtime.execute('LiquidityLedger.setCustody', async () => {
      this.roster.requireAdmin(caller, 'setCustody');
      this.custody = custody;
      console.log(`[LiquidityLedger] Custody set to ${custody.name}`);
    });
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  async hydrate(): Promise<void> {
    if (!this.repository) return;
    const stored = await this.repository.loadPoolState();
    if (stored) {
      this.pool.hydrate(stored);
    }
  }

  async flush(session: PersistenceSession): Promise<void> {
    if (!this.repository) return;
    const state = this.pool.drainDirty();
    if (state) {
      await this.repository.savePoolState(session, state);
    }
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private fundMovement<T>(action: string, work: () => Promise<T>): Promise<T> {
    return this.runtime.execute(`LiquidityLedger.${action}`, () => this.guard.run(work));
  }

  private async pull(from: Address, amount: bigint, purpose: string): Promise<void> {
    const ok = await this.custody.transferFrom(this.address, from, this.address, amount);
    if (!ok) {
      throw new ProtocolError('TRANSFER_FAILED', `Custody refused ${purpose}: ${amount} from ${from}`);
    }
  }

  private async push(to: Address, amount: bigint, purpose: string): Promise<void> {
    const ok = await this.custody.transfer(this.address, to, amount);
    if (!ok) {
      throw new ProtocolError('TRANSFER_FAILED', `Custody refused ${purpose}: ${amount} to ${to}`);
    }
  }
}
