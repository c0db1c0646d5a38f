/**
 * BNPL Credit Protocol - Composition Root
 *
 * Builds the four components on one runtime, grants the roster
 * capabilities and wires the components to each other.
 */

import { AccessRoster, AccessRepository, Capability } from './core/access';
import { CreditLedgerService, CreditRepository } from './core/credit';
import { LiquidityLedgerService, LiquidityRepository } from './core/liquidity';
import { ProtocolRuntime, StateStore } from './core/runtime';
import { SettingsRepository } from './database';
import { DefaultDetectorService } from './modules/defaults';
import { EventMirror, InMemoryEventMirror } from './modules/events';
import { AssetCustody } from './modules/custody';
import { LoanOrchestratorService, LoanRepository } from './modules/loans';
import { Clock, SystemClock } from './shared/clock';
import { Address } from './shared/types';

export interface ComponentAddresses {
  orchestrator: Address;
  creditLedger: Address;
  liquidityLedger: Address;
  defaultDetector: Address;
}

export interface ProtocolSettings {
  repaymentWindowDays: number;
  feeRateBps: number;
  gracePeriodDays: number;
}

export const DEFAULT_SETTINGS: ProtocolSettings = {
  repaymentWindowDays: 30,
  feeRateBps: 50,
  gracePeriodDays: 3,
};

export interface BnplProtocolOptions<C extends AssetCustody> {
  admin: Address;
  addresses: ComponentAddresses;
  /** Custody stores share the runtime journal so transfers roll back with the protocol */
  createCustody: (runtime: ProtocolRuntime) => C;
  clock?: Clock;
  eventMirror?: EventMirror;
  settings?: Partial<ProtocolSettings>;
  /** Enables persistence and hydration (PgStateStore over a pg Pool in production) */
  store?: StateStore;
}

export interface BnplProtocol<C extends AssetCustody> {
  runtime: ProtocolRuntime;
  roster: AccessRoster;
  clock: Clock;
  custody: C;
  eventMirror: EventMirror;
  orchestrator: LoanOrchestratorService;
  creditLedger: CreditLedgerService;
  liquidityLedger: LiquidityLedgerService;
  defaultDetector: DefaultDetectorService;
}

export async function createBnplProtocol<C extends AssetCustody>(
  options: BnplProtocolOptions<C>
): Promise<BnplProtocol<C>> {
  const { addresses, store } = options;
  const settings: ProtocolSettings = { ...DEFAULT_SETTINGS, ...options.settings };
  const clock = options.clock ?? new SystemClock();
  const eventMirror = options.eventMirror ?? new InMemoryEventMirror();

  const runtime = new ProtocolRuntime({
    eventMirror,
    persistence: store,
  });
  const settingsRepository = store ? new SettingsRepository(store) : undefined;

  const roster = new AccessRoster(runtime, options.admin, store ? new AccessRepository(store) : undefined);
  const custody = options.createCustody(runtime);

  const creditLedger = new CreditLedgerService(
    addresses.creditLedger,
    runtime,
    roster,
    store ? new CreditRepository(store) : undefined
  );
  const liquidityLedger = new LiquidityLedgerService(
    addresses.liquidityLedger,
    runtime,
    roster,
    custody,
    store ? new LiquidityRepository(store) : undefined
  );
  const orchestrator = new LoanOrchestratorService({
    address: addresses.orchestrator,
    runtime,
    roster,
    clock,
    settings: { repaymentWindowDays: settings.repaymentWindowDays, feeRateBps: settings.feeRateBps },
    loanRepository: store ? new LoanRepository(store) : undefined,
    settingsRepository,
  });
  const defaultDetector = new DefaultDetectorService({
    address: addresses.defaultDetector,
    runtime,
    roster,
    clock,
    gracePeriodDays: settings.gracePeriodDays,
    settingsRepository,
  });

  if (store) {
    console.log('[Protocol] Hydrating stored state...');
    await roster.hydrate();
    await creditLedger.hydrate();
    await liquidityLedger.hydrate();
    await orchestrator.hydrate();
    await defaultDetector.hydrate();

    runtime.register(roster);
    runtime.register(creditLedger);
    runtime.register(liquidityLedger);
    runtime.register(orchestrator);
    runtime.register(defaultDetector);
  }

  // Stored grants win over the configured addresses: an admin re-grant survives restarts
  const admin = roster.getAdmin();
  const defaultGrants: Array<[Capability, Address]> = [
    ['CREDIT_LEDGER_WRITER', addresses.orchestrator],
    ['LIQUIDITY_LEDGER_WRITER', addresses.orchestrator],
    ['DEFAULT_CHECK_CALLER', addresses.orchestrator],
    ['CREDIT_DEFAULT_REPORTER', addresses.defaultDetector],
    ['LOAN_DEFAULT_REPORTER', addresses.defaultDetector],
  ];
  for (const [capability, holder] of defaultGrants) {
    const stored = roster.holderOf(capability);
    if (stored === null) {
      await roster.grant(admin, capability, holder);
    } else if (stored !== holder) {
      console.warn(`[Protocol] Keeping stored ${capability} holder ${stored} (configured: ${holder})`);
    }
  }

  await orchestrator.wire(admin, { creditLedger, liquidityLedger, defaultDetector, custody });
  await defaultDetector.wire(admin, { loans: orchestrator, creditLedger, custody });

  console.log(`[Protocol] Ready (custody: ${custody.name}, mirror: ${eventMirror.name})`);

  return {
    runtime,
    roster,
    clock,
    custody,
    eventMirror,
    orchestrator,
    creditLedger,
    liquidityLedger,
    defaultDetector,
  };
}
