/**
 * BNPL Credit Protocol - Liquidity Ledger Module Export
 */

export { LiquidityLedgerService } from './liquidity-ledger.service';
export { LiquidityRepository } from './liquidity.repository';
