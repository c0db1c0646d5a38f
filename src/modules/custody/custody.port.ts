/**
 * BNPL Credit Protocol - Asset Custody Port
 *
 * ARCHITECTURAL CONCEPT (THE AIR GAP):
 * The ledgers never hold value themselves. All balances live behind this
 * interface, and only the Liquidity Ledger moves funds through it.
 *
 * CONTRACT:
 * - transfer / transferFrom report success as a boolean; callers must check it
 * - freeze / unfreeze may throw; callers treat that as a soft failure
 * - isKycPassed is an optional check; absence means "passed"
 */

import { Address } from '../../shared/types';

export interface AssetCustody {
  /** Custody identifier */
  readonly name: string;

  /** Move `amount` from `from` (the caller's own account) to `to` */
  transfer(from: Address, to: Address, amount: bigint): Promise<boolean>;

  /** Move `amount` from `from` to `to` using the allowance granted to `spender` */
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<boolean>;

  balanceOf(account: Address): Promise<bigint>;

  /** Block outgoing transfers from `account` */
  freeze(operator: Address, account: Address): Promise<void>;

  unfreeze(operator: Address, account: Address): Promise<void>;

  isKycPassed?(account: Address): Promise<boolean>;
}

export class CustodyError extends Error {
  constructor(
    public readonly code: 'NOT_OPERATOR' | 'INVALID_AMOUNT',
    message: string
  ) {
    super(message);
    this.name = 'CustodyError';
  }
}
