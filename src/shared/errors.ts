/**
 * BNPL Credit Protocol - Error Taxonomy
 *
 * Every non-soft failure is a ProtocolError. The runtime rolls back the
 * whole cross-ledger operation before the error reaches the caller.
 */

export type ErrorCategory = 'VALIDATION' | 'AUTHORIZATION' | 'STATE_CONFLICT' | 'EXTERNAL';

const ERROR_CATEGORIES = {
  // Malformed input
  INVALID_AMOUNT: 'VALIDATION',
  INVALID_ADDRESS: 'VALIDATION',
  INVALID_LIMIT: 'VALIDATION',
  INVALID_SETTING: 'VALIDATION',
  INVALID_REASON: 'VALIDATION',
  LENGTH_MISMATCH: 'VALIDATION',
  LOAN_NOT_FOUND: 'VALIDATION',
  LOAN_BORROWER_MISMATCH: 'VALIDATION',
  NOT_WIRED: 'VALIDATION',

  // Caller is not the stored holder
  UNAUTHORIZED: 'AUTHORIZATION',
  NOT_BORROWER: 'AUTHORIZATION',
  NOT_LOAN_PARTY: 'AUTHORIZATION',
  REENTRANT_CALL: 'AUTHORIZATION',

  // Lifecycle violations
  BORROWER_DEFAULTED: 'STATE_CONFLICT',
  ACTIVE_LOAN_EXISTS: 'STATE_CONFLICT',
  KYC_NOT_PASSED: 'STATE_CONFLICT',
  INSUFFICIENT_CREDIT: 'STATE_CONFLICT',
  INSUFFICIENT_LIQUIDITY: 'STATE_CONFLICT',
  INSUFFICIENT_FEES: 'STATE_CONFLICT',
  LIMIT_BELOW_USED: 'STATE_CONFLICT',
  RESTORE_EXCEEDS_USED: 'STATE_CONFLICT',
  ALREADY_REPAID: 'STATE_CONFLICT',
  NOT_OVERDUE: 'STATE_CONFLICT',
  OUTSTANDING_UNDERFLOW: 'STATE_CONFLICT',

  // Custody reported failure
  TRANSFER_FAILED: 'EXTERNAL',
} as const satisfies Record<string, ErrorCategory>;

export type ProtocolErrorCode = keyof typeof ERROR_CATEGORIES;

export class ProtocolError extends Error {
  public readonly category: ErrorCategory;

  constructor(
    public readonly code: ProtocolErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ProtocolError';
    this.category = ERROR_CATEGORIES[code];
  }
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
