/**
 * BNPL Credit Protocol - Loans Module
 *
 * Exports the loan orchestrator and its persistence.
 */

export {
  LoanOrchestratorService,
  LoanOrchestratorOptions,
  OrchestratorWiring,
  MAX_FEE_RATE_BPS,
  computeFee,
} from './loan-orchestrator.service';
export { LoanRepository } from './loan.repository';
