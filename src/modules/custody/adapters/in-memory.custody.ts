/**
 * BNPL Credit Protocol - In-Memory Custody Adapter
 * Mock asset for dev mode and tests.
 *
 * DESIGN:
 * - Balances, allowances and freezes live in journaled stores, so a
 *   rolled-back protocol operation also rolls back the transfers it made
 * - Failed transfers return false (never throw), like a token that
 *   reports success as a boolean
 * - Only registered operators may freeze or unfreeze
 */

import { Journal, TrackedMap } from '../../../core/runtime';
import { Address } from '../../../shared/types';
import { AssetCustody, CustodyError } from '../custody.port';

export interface InMemoryCustodyOptions {
  /** Addresses allowed to freeze / unfreeze accounts */
  operators?: Address[];
}

export class InMemoryCustody implements AssetCustody {
  readonly name: string = 'IN_MEMORY_CUSTODY';

  private readonly balances: TrackedMap<Address, bigint>;
  private readonly allowances: TrackedMap<string, bigint>;
  private readonly frozen: TrackedMap<Address, boolean>;
  private readonly operators: Set<Address>;

  constructor(journal: Journal, options: InMemoryCustodyOptions = {}) {
    this.balances = new TrackedMap(journal);
    this.allowances = new TrackedMap(journal);
    this.frozen = new TrackedMap(journal);
    this.operators = new Set(options.operators ?? []);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<boolean> {
    return this.move(from, to, amount);
  }

  async transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
    const allowance = this.allowance(from, spender);
    if (allowance < amount) {
      console.warn(`[InMemoryCustody] Allowance ${allowance} < ${amount} for ${spender} on ${from}`);
      return false;
    }

    if (!this.move(from, to, amount)) {
      return false;
    }

    this.allowances.set(allowanceKey(from, spender), allowance - amount);
    return true;
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.balances.get(account) ?? 0n;
  }

  async freeze(operator: Address, account: Address): Promise<void> {
    this.requireOperator(operator);
    this.frozen.set(account, true);
  }

  async unfreeze(operator: Address, account: Address): Promise<void> {
    this.requireOperator(operator);
    this.frozen.set(account, false);
  }

  // ============================================
  // TEST / DEV HELPERS
  // ============================================

  /** Credit new units to an account (faucet) */
  mint(account: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new CustodyError('INVALID_AMOUNT', 'Mint amount must be positive');
    }
    this.balances.set(account, (this.balances.get(account) ?? 0n) + amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  isFrozen(account: Address): boolean {
    return this.frozen.get(account) ?? false;
  }

  addOperator(operator: Address): void {
    this.operators.add(operator);
  }

  // ============================================
  // PRIVATE
  // ============================================

  private move(from: Address, to: Address, amount: bigint): boolean {
    if (amount <= 0n) return false;

    if (this.isFrozen(from)) {
      console.warn(`[InMemoryCustody] Transfer from frozen account ${from} refused`);
      return false;
    }

    const fromBalance = this.balances.get(from) ?? 0n;
    if (fromBalance < amount) {
      console.warn(`[InMemoryCustody] Insufficient balance on ${from}: ${fromBalance} < ${amount}`);
      return false;
    }

    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
    return true;
  }

  private requireOperator(operator: Address): void {
    if (!this.operators.has(operator)) {
      throw new CustodyError('NOT_OPERATOR', `${operator} is not a custody operator`);
    }
  }
}

/**
 * Custody asset with a KYC registry. Exposes the optional isKycPassed check.
 */
export class KycGatedCustody extends InMemoryCustody {
  readonly name: string = 'KYC_GATED_CUSTODY';

  private readonly kycPassed: TrackedMap<Address, boolean>;

  constructor(journal: Journal, options: InMemoryCustodyOptions = {}) {
    super(journal, options);
    this.kycPassed = new TrackedMap(journal);
  }

  async isKycPassed(account: Address): Promise<boolean> {
    return this.kycPassed.get(account) ?? false;
  }

  setKyc(account: Address, passed: boolean): void {
    this.kycPassed.set(account, passed);
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}
