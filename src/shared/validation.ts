/**
 * Input guards shared by every ledger. All throw VALIDATION errors
 * before any state is touched.
 */

import { ProtocolError } from './errors';
import { Address, isAddress, ZERO_ADDRESS } from './types';

export function requireAddress(value: Address, field: string): void {
  if (!isAddress(value) || value === ZERO_ADDRESS) {
    throw new ProtocolError('INVALID_ADDRESS', `${field} must be a non-zero address (got ${value})`);
  }
}

export function requirePositiveAmount(amount: bigint, field: string = 'amount'): void {
  if (amount <= 0n) {
    throw new ProtocolError('INVALID_AMOUNT', `${field} must be positive (got ${amount})`);
  }
}

export function requireEqualLengths(left: readonly unknown[], right: readonly unknown[], names: string): void {
  if (left.length !== right.length) {
    throw new ProtocolError('LENGTH_MISMATCH', `${names} length mismatch: ${left.length} vs ${right.length}`);
  }
}
