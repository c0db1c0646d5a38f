/**
 * BNPL Credit Protocol - Credit Ledger Module Export
 */

export { CreditLedgerService } from './credit-ledger.service';
export { CreditRepository } from './credit.repository';
