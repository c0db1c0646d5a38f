/**
 * BNPL Credit Protocol - Mirror Event Types
 * Append-only records published after an operation commits.
 */

import { Address } from './protocol.types';

export type ProtocolEventType = 'LOAN_CREATED' | 'REPAYMENT' | 'DEFAULT' | 'DISPUTE';

export interface LoanCreatedEvent {
  readonly type: 'LOAN_CREATED';
  readonly user: Address;
  readonly merchant: Address;
  readonly loanId: number;
  readonly amount: bigint;
  readonly dueAt: number;
  readonly time: number;
}

export interface RepaymentEvent {
  readonly type: 'REPAYMENT';
  readonly user: Address;
  readonly merchant: Address;
  readonly loanId: number;
  readonly amount: bigint;
  readonly time: number;
  readonly success: boolean;
}

export interface DefaultEvent {
  readonly type: 'DEFAULT';
  readonly user: Address;
  readonly loanId: number;
  readonly overdueAmount: bigint;
  readonly daysOverdue: number;
  readonly time: number;
}

export interface DisputeEvent {
  readonly type: 'DISPUTE';
  readonly user: Address;
  readonly merchant: Address;
  readonly loanId: number;
  readonly reason: string;
  readonly time: number;
}

export type ProtocolEvent = LoanCreatedEvent | RepaymentEvent | DefaultEvent | DisputeEvent;

/**
 * JSON-safe view of an event (bigint fields as decimal strings)
 */
export function serializeEvent(event: ProtocolEvent): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(event)) {
    out[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return out;
}
