/**
 * BNPL Credit Protocol - Response Serializers
 * bigint fields leave the API as decimal strings.
 */

import { CreditAccount, DefaultPreview, LiquidityPoolState, Loan, LoanPreview, LoanSettings } from '../shared/types';

export function serializeLoan(loan: Loan) {
  return {
    id: loan.id,
    borrower: loan.borrower,
    merchant: loan.merchant,
    principal: loan.principal.toString(),
    fee: loan.fee.toString(),
    created_at: loan.createdAt,
    due_at: loan.dueAt,
    state: loan.state,
    repaid_at: loan.repaidAt,
    defaulted_at: loan.defaultedAt,
  };
}

export function serializeLoanPreview(preview: LoanPreview) {
  return {
    principal: preview.principal.toString(),
    fee: preview.fee.toString(),
    merchant_payout: preview.merchantPayout.toString(),
    due_at: preview.dueAt,
  };
}

export function serializeCreditAccount(account: CreditAccount, available: bigint, utilizationBps: bigint) {
  return {
    user: account.user,
    limit: account.limit.toString(),
    used: account.used.toString(),
    available: available.toString(),
    utilization_bps: utilizationBps.toString(),
    defaulted: account.defaulted,
    has_active_credit: account.hasActiveCredit,
  };
}

export function serializePoolState(state: LiquidityPoolState, available: bigint, utilizationBps: bigint) {
  return {
    total_liquidity: state.totalLiquidity.toString(),
    outstanding_credit: state.outstandingCredit.toString(),
    protocol_fees: state.protocolFees.toString(),
    available_liquidity: available.toString(),
    utilization_bps: utilizationBps.toString(),
  };
}

export function serializeDefaultPreview(preview: DefaultPreview) {
  if (!preview.eligible) {
    return { eligible: false, reason: preview.reason };
  }
  return {
    eligible: true,
    days_overdue: preview.daysOverdue,
    overdue_amount: preview.overdueAmount.toString(),
  };
}

export function serializeSettings(settings: LoanSettings, gracePeriodDays: number) {
  return {
    repayment_window_days: settings.repaymentWindowDays,
    fee_rate_bps: settings.feeRateBps,
    grace_period_days: gracePeriodDays,
  };
}
