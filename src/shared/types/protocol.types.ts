/**
 * BNPL Credit Protocol - Core Types
 *
 * UNITS:
 * 1. NO FLOATING POINT: amounts are bigint base units of the custody asset.
 * 2. TIME: whole UNIX seconds from the shared protocol clock.
 * 3. IDENTITY: lower-case 0x-prefixed 20-byte hex addresses.
 */

export type Address = `0x${string}`;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

export const SECONDS_PER_DAY = 86_400;

/** Basis-point denominator for fee rates and utilization */
export const BPS_DENOMINATOR = 10_000n;

const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

export function isAddress(value: string): value is Address {
  return ADDRESS_PATTERN.test(value);
}

/**
 * Normalize a user-supplied address string. Returns null when malformed.
 */
export function toAddress(value: string): Address | null {
  const normalized = value.trim().toLowerCase();
  return isAddress(normalized) ? normalized : null;
}

// ============================================================================
// LOANS
// ============================================================================

export type LoanState = 'ACTIVE' | 'REPAID' | 'DEFAULTED';

/**
 * Loan - a single deferred-payment draw.
 *
 * Immutable after creation except the terminal fields
 * (state, repaidAt, defaultedAt). Never deleted.
 */
export interface Loan {
  readonly id: number;              // 1-based, monotonic, never reused
  readonly borrower: Address;
  readonly merchant: Address;
  readonly principal: bigint;       // Full repayment obligation
  readonly fee: bigint;             // Withheld from merchant payout
  readonly createdAt: number;
  readonly dueAt: number;
  readonly state: LoanState;
  readonly repaidAt: number | null;
  readonly defaultedAt: number | null;
}

export interface LoanSettings {
  readonly repaymentWindowDays: number;
  readonly feeRateBps: number;      // 0 - 10000
}

export interface LoanPreview {
  readonly principal: bigint;
  readonly fee: bigint;
  readonly merchantPayout: bigint;
  readonly dueAt: number;
}

export type IneligibilityReason =
  | 'INVALID_AMOUNT'
  | 'BORROWER_DEFAULTED'
  | 'ACTIVE_LOAN_EXISTS'
  | 'INSUFFICIENT_CREDIT'
  | 'INSUFFICIENT_LIQUIDITY';

export type EligibilityResult =
  | { eligible: true }
  | { eligible: false; reason: IneligibilityReason };

// ============================================================================
// CREDIT
// ============================================================================

/**
 * CreditAccount
 *
 * INVARIANTS:
 * - used <= limit
 * - hasActiveCredit <=> used > 0 (at most one open draw)
 * - defaulted only cleared by admin unblock
 */
export interface CreditAccount {
  readonly user: Address;
  readonly limit: bigint;
  readonly used: bigint;
  readonly defaulted: boolean;
  readonly hasActiveCredit: boolean;
}

// ============================================================================
// LIQUIDITY
// ============================================================================

export interface LiquidityPoolState {
  readonly totalLiquidity: bigint;
  readonly outstandingCredit: bigint;
  readonly protocolFees: bigint;
}

// ============================================================================
// DEFAULTS
// ============================================================================

export type DefaultPreview =
  | { eligible: true; daysOverdue: number; overdueAmount: bigint }
  | { eligible: false; reason: 'LOAN_NOT_FOUND' | 'LOAN_BORROWER_MISMATCH' | 'ALREADY_REPAID' | 'NOT_OVERDUE' | 'ALREADY_DEFAULTED' };
