/**
 * Shared fixtures for protocol tests: fixed identities, a manual clock,
 * the in-memory custody asset and the in-memory event mirror.
 */

import { ProtocolRuntime, StateStore } from '../src/core/runtime';
import { AssetCustody, InMemoryCustody } from '../src/modules/custody';
import { InMemoryEventMirror } from '../src/modules/events';
import { BnplProtocol, ProtocolSettings, createBnplProtocol } from '../src/protocol';
import { ManualClock } from '../src/shared/clock';
import { Address } from '../src/shared/types';

export function addr(n: number): Address {
  return `0x${n.toString(16).padStart(40, '0')}`;
}

export const ADMIN = addr(0xad);
export const ORCHESTRATOR = addr(0xb1);
export const CREDIT_LEDGER = addr(0xb2);
export const POOL = addr(0xb3);
export const DETECTOR = addr(0xb4);

export const ALICE = addr(0xa1);
export const BOB = addr(0xa2);
export const CAROL = addr(0xa3);
export const MERCHANT = addr(0xc1);
export const PROVIDER = addr(0xd1);
export const TREASURY = addr(0xe1);
export const OUTSIDER = addr(0xee);

export const DAY = 86_400;

export type TestProtocol<C extends AssetCustody> = BnplProtocol<C> & {
  clock: ManualClock;
  eventMirror: InMemoryEventMirror;
};

export async function buildTestProtocolWith<C extends AssetCustody>(
  createCustody: (runtime: ProtocolRuntime) => C,
  settings: Partial<ProtocolSettings> = {},
  store?: StateStore
): Promise<TestProtocol<C>> {
  const clock = new ManualClock();
  const eventMirror = new InMemoryEventMirror();

  const protocol = await createBnplProtocol({
    admin: ADMIN,
    addresses: {
      orchestrator: ORCHESTRATOR,
      creditLedger: CREDIT_LEDGER,
      liquidityLedger: POOL,
      defaultDetector: DETECTOR,
    },
    createCustody,
    clock,
    eventMirror,
    settings,
    store,
  });

  return { ...protocol, clock, eventMirror };
}

export function buildTestProtocol(
  settings: Partial<ProtocolSettings> = {},
  store?: StateStore
): Promise<TestProtocol<InMemoryCustody>> {
  return buildTestProtocolWith((runtime) => new InMemoryCustody(runtime, { operators: [DETECTOR] }), settings, store);
}

/**
 * Mint to the provider, approve the pool and deposit
 */
export async function fundPool(p: TestProtocol<InMemoryCustody>, amount: bigint): Promise<void> {
  p.custody.mint(PROVIDER, amount);
  p.custody.approve(PROVIDER, POOL, amount);
  await p.liquidityLedger.depositLiquidity(PROVIDER, amount);
}

/**
 * Give a borrower a credit limit plus funds and pool approval to repay
 */
export async function onboardBorrower(
  p: TestProtocol<InMemoryCustody>,
  borrower: Address,
  limit: bigint,
  balance: bigint = limit
): Promise<void> {
  await p.creditLedger.setLimit(ADMIN, borrower, limit);
  p.custody.mint(borrower, balance);
  p.custody.approve(borrower, POOL, balance);
}
