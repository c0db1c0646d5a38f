/**
 * Privileged relationships of the protocol. Exactly one holder each.
 */

export const CAPABILITIES = [
  'CREDIT_LEDGER_WRITER',     // Orchestrator -> Credit Ledger use/restore
  'CREDIT_DEFAULT_REPORTER',  // Default Detector -> Credit Ledger markDefaulted
  'LIQUIDITY_LEDGER_WRITER',  // Orchestrator -> Liquidity Ledger settle/receive/collect
  'LOAN_DEFAULT_REPORTER',    // Default Detector -> Orchestrator markBNPLAsDefaulted
  'DEFAULT_CHECK_CALLER',     // Orchestrator -> Default Detector checks
] as const;

export type Capability = typeof CAPABILITIES[number];

export function isCapability(value: string): value is Capability {
  return CAPABILITIES.some((capability) => capability === value);
}
