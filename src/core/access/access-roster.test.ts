import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { ProtocolRuntime } from '../runtime';
import { InMemoryEventMirror } from '../../modules/events';
import { AccessRoster } from './access-roster';
import { isCapability } from './capabilities';

const ADMIN = '0x00000000000000000000000000000000000000ad';
const ORCHESTRATOR = '0x00000000000000000000000000000000000000b1';
const DETECTOR = '0x00000000000000000000000000000000000000b4';
const OUTSIDER = '0x00000000000000000000000000000000000000ee';

describe('AccessRoster', () => {
  let roster: AccessRoster;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    roster = new AccessRoster(new ProtocolRuntime({ eventMirror: new InMemoryEventMirror() }), ADMIN);
  });

  it('rejects the zero address as admin', () => {
    const runtime = new ProtocolRuntime({ eventMirror: new InMemoryEventMirror() });
    expect(() => new AccessRoster(runtime, '0x0000000000000000000000000000000000000000')).toThrow(
      'admin must be a non-zero address'
    );
  });

  it('grants exactly one holder per capability', async () => {
    await roster.grant(ADMIN, 'CREDIT_LEDGER_WRITER', ORCHESTRATOR);
    expect(roster.holderOf('CREDIT_LEDGER_WRITER')).toBe(ORCHESTRATOR);

    await roster.grant(ADMIN, 'CREDIT_LEDGER_WRITER', DETECTOR);
    expect(roster.holderOf('CREDIT_LEDGER_WRITER')).toBe(DETECTOR);
    expect(() => roster.authorize('CREDIT_LEDGER_WRITER', ORCHESTRATOR, 'useCredit')).toThrow(
      `useCredit: caller ${ORCHESTRATOR} does not hold CREDIT_LEDGER_WRITER`
    );
  });

  it('does not let one capability stand in for another', async () => {
    await roster.grant(ADMIN, 'CREDIT_LEDGER_WRITER', ORCHESTRATOR);

    expect(() => roster.authorize('CREDIT_LEDGER_WRITER', ORCHESTRATOR, 'useCredit')).not.toThrow();
    expect(() => roster.authorize('LIQUIDITY_LEDGER_WRITER', ORCHESTRATOR, 'settleMerchant')).toThrow();
  });

  it('lets the admin or the holder through authorizeAdminOr', async () => {
    await roster.grant(ADMIN, 'DEFAULT_CHECK_CALLER', ORCHESTRATOR);

    expect(() => roster.authorizeAdminOr('DEFAULT_CHECK_CALLER', ADMIN, 'check')).not.toThrow();
    expect(() => roster.authorizeAdminOr('DEFAULT_CHECK_CALLER', ORCHESTRATOR, 'check')).not.toThrow();
    expect(() => roster.authorizeAdminOr('DEFAULT_CHECK_CALLER', OUTSIDER, 'check')).toThrow();
  });

  it('only lets the admin grant', async () => {
    await expect(roster.grant(OUTSIDER, 'LOAN_DEFAULT_REPORTER', OUTSIDER)).rejects.toMatchObject({
      code: 'UNAUTHORIZED',
    });
    expect(roster.holderOf('LOAN_DEFAULT_REPORTER')).toBeNull();
  });

  it('moves admin rights on transferAdmin', async () => {
    await roster.transferAdmin(ADMIN, OUTSIDER);

    expect(roster.getAdmin()).toBe(OUTSIDER);
    expect(roster.isAdmin(ADMIN)).toBe(false);
    await expect(roster.grant(ADMIN, 'CREDIT_LEDGER_WRITER', ORCHESTRATOR)).rejects.toMatchObject({
      code: 'UNAUTHORIZED',
    });
  });

  it('recognizes capability names', () => {
    expect(isCapability('CREDIT_DEFAULT_REPORTER')).toBe(true);
    expect(isCapability('ADMIN')).toBe(false);
  });
});
