import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Express } from 'express';
import request from 'supertest';
import { createApp } from '../src/api';
import { InMemoryCustody } from '../src/modules/custody';
import {
  ADMIN,
  ALICE,
  BOB,
  DAY,
  MERCHANT,
  ORCHESTRATOR,
  PROVIDER,
  TestProtocol,
  buildTestProtocol,
} from './helpers';

const T0 = 1_700_000_000;
const ADMIN_KEY = 'test-admin-secret';
const ALICE_KEY = 'test-secret-alice';
const BOB_KEY = 'test-secret-bob';
const PROVIDER_KEY = 'test-secret-provider';

describe('HTTP API', () => {
  let p: TestProtocol<InMemoryCustody>;
  let app: Express;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    p = await buildTestProtocol();
    app = createApp(p, {
      adminApiKey: ADMIN_KEY,
      actorKeys: [
        { key: ALICE_KEY, address: ALICE },
        { key: BOB_KEY, address: BOB },
        { key: PROVIDER_KEY, address: PROVIDER },
      ],
      rateLimitRpm: 1000,
      devCustody: p.custody,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function seedPoolAndBorrower(): Promise<void> {
    await request(app).post('/admin/custody/mint').set('x-api-key', ADMIN_KEY).send({ account: PROVIDER, amount: '10000' });
    await request(app).post('/v1/custody/approve').set('x-api-key', PROVIDER_KEY).send({ amount: '10000' });
    await request(app).post('/v1/pool/deposit').set('x-api-key', PROVIDER_KEY).send({ amount: '10000' });

    await request(app).post('/admin/credit/limits').set('x-api-key', ADMIN_KEY).send({ user: ALICE, limit: '1000' });
    await request(app).post('/admin/custody/mint').set('x-api-key', ADMIN_KEY).send({ account: ALICE, amount: '1000' });
    await request(app).post('/v1/custody/approve').set('x-api-key', ALICE_KEY).send({ amount: '1000' });
  }

  async function openLoan(): Promise<void> {
    await request(app)
      .post('/v1/loans')
      .set('x-api-key', ALICE_KEY)
      .send({ borrower: ALICE, merchant: MERCHANT, amount: '1000' });
  }

  it('reports health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'OK', custody: 'IN_MEMORY_CUSTODY', event_mirror: 'IN_MEMORY' });
  });

  describe('loan lifecycle', () => {
    beforeEach(seedPoolAndBorrower);

    it('funds the pool from an approved deposit', async () => {
      const res = await request(app).get('/v1/pool');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        total_liquidity: '10000',
        outstanding_credit: '0',
        protocol_fees: '0',
        available_liquidity: '10000',
        utilization_bps: '0',
        custody_balance: '10000',
      });
    });

    it('opens and repays a loan', async () => {
      const created = await request(app)
        .post('/v1/loans')
        .set('x-api-key', ALICE_KEY)
        .send({ borrower: ALICE, merchant: MERCHANT, amount: '1000' });

      expect(created.status).toBe(201);
      expect(created.body.loan).toEqual({
        id: 1,
        borrower: ALICE,
        merchant: MERCHANT,
        principal: '1000',
        fee: '5',
        created_at: T0,
        due_at: T0 + 30 * DAY,
        state: 'ACTIVE',
        repaid_at: null,
        defaulted_at: null,
      });

      const pool = await request(app).get('/v1/pool');
      expect(pool.body).toMatchObject({
        total_liquidity: '9005',
        outstanding_credit: '1000',
        protocol_fees: '5',
        available_liquidity: '8005',
        utilization_bps: '1110',
      });

      const credit = await request(app).get(`/v1/borrowers/${ALICE}/credit`);
      expect(credit.body).toEqual({
        user: ALICE,
        limit: '1000',
        used: '1000',
        available: '0',
        utilization_bps: '10000',
        defaulted: false,
        has_active_credit: true,
      });

      const repaid = await request(app).post('/v1/loans/1/repay').set('x-api-key', ALICE_KEY);
      expect(repaid.status).toBe(200);
      expect(repaid.body.loan).toMatchObject({ state: 'REPAID', repaid_at: T0 });

      const history = await request(app).get(`/v1/borrowers/${ALICE}/loans`);
      expect(history.body).toMatchObject({ borrower: ALICE, active_loan_id: 0 });
      expect(history.body.loans).toHaveLength(1);
    });

    it('maps protocol errors to status codes', async () => {
      const zero = await request(app)
        .post('/v1/loans')
        .set('x-api-key', ALICE_KEY)
        .send({ borrower: ALICE, merchant: MERCHANT, amount: '0' });
      expect(zero.status).toBe(400);
      expect(zero.body).toMatchObject({ code: 'INVALID_AMOUNT', category: 'VALIDATION' });

      const tooMuch = await request(app)
        .post('/v1/loans')
        .set('x-api-key', ALICE_KEY)
        .send({ borrower: ALICE, merchant: MERCHANT, amount: '1001' });
      expect(tooMuch.status).toBe(409);
      expect(tooMuch.body).toMatchObject({ code: 'INSUFFICIENT_CREDIT', category: 'STATE_CONFLICT' });

      const onBehalf = await request(app)
        .post('/v1/loans')
        .set('x-api-key', BOB_KEY)
        .send({ borrower: ALICE, merchant: MERCHANT, amount: '100' });
      expect(onBehalf.status).toBe(403);
      expect(onBehalf.body).toMatchObject({ code: 'NOT_BORROWER', category: 'AUTHORIZATION' });
      expect(p.orchestrator.getLoan(1)).toBeNull();

      await openLoan();
      const wrongBorrower = await request(app).post('/v1/loans/1/repay').set('x-api-key', BOB_KEY);
      expect(wrongBorrower.status).toBe(403);
      expect(wrongBorrower.body).toMatchObject({ code: 'NOT_BORROWER', category: 'AUTHORIZATION' });
    });

    it('rejects malformed requests before reaching the protocol', async () => {
      const res = await request(app)
        .post('/v1/loans')
        .set('x-api-key', ALICE_KEY)
        .send({ borrower: ALICE, merchant: 'nobody', amount: '-5' });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_REQUEST');
      expect(res.body.issues.map((issue: { path: string }) => issue.path)).toEqual(['merchant', 'amount']);
      expect(p.orchestrator.getLoan(1)).toBeNull();
    });

    it('previews loans and eligibility', async () => {
      const preview = await request(app).get('/v1/loans/preview?amount=10000');
      expect(preview.body).toEqual({ principal: '10000', fee: '50', merchant_payout: '9950', due_at: T0 + 30 * DAY });

      const eligibility = await request(app).get(`/v1/borrowers/${ALICE}/eligibility?amount=2000`);
      expect(eligibility.body).toEqual({ eligible: false, reason: 'INSUFFICIENT_CREDIT' });
    });

    it('lets any actor trigger a default check once overdue', async () => {
      await openLoan();

      const early = await request(app).get(`/v1/defaults/preview?user=${ALICE}&loan_id=1`);
      expect(early.body).toEqual({ eligible: false, reason: 'NOT_OVERDUE' });

      p.clock.advance(40 * DAY);
      const res = await request(app)
        .post('/v1/loans/1/check-default')
        .set('x-api-key', BOB_KEY)
        .send({ borrower: ALICE });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ loan_id: 1, defaulted: true });
      expect(p.creditLedger.isDefaulted(ALICE)).toBe(true);
    });

    it('runs a batch default check from the admin API', async () => {
      await openLoan();
      p.clock.advance(40 * DAY);

      const res = await request(app)
        .post('/admin/defaults/batch')
        .set('x-api-key', ADMIN_KEY)
        .send({ users: [ALICE], loan_ids: [1] });

      expect(res.body).toEqual({ processed: 1 });
      const loan = await request(app).get('/v1/loans/1');
      expect(loan.body.loan).toMatchObject({ state: 'DEFAULTED', defaulted_at: T0 + 40 * DAY });
    });
  });

  describe('authentication', () => {
    it('requires a known actor key', async () => {
      const missing = await request(app).post('/v1/pool/deposit').send({ amount: '1' });
      expect(missing.status).toBe(401);
      expect(missing.body).toEqual({ error: 'Missing API key' });

      const unknown = await request(app).post('/v1/pool/deposit').set('x-api-key', 'test-wrong').send({ amount: '1' });
      expect(unknown.status).toBe(403);
      expect(unknown.body).toEqual({ error: 'Invalid API key' });
    });

    it('requires the admin key for admin routes', async () => {
      const actor = await request(app).get('/admin/roster').set('x-api-key', ALICE_KEY);
      expect(actor.status).toBe(403);

      const res = await request(app).get('/admin/roster').set('x-api-key', ADMIN_KEY);
      expect(res.status).toBe(200);
      expect(res.body.admin).toBe(ADMIN);
      expect(res.body.grants).toMatchObject({ CREDIT_LEDGER_WRITER: ORCHESTRATOR });
    });

    it('refuses admin routes when no admin key is configured', async () => {
      const bare = createApp(p, { actorKeys: [], rateLimitRpm: 1000 });

      const res = await request(bare).get('/admin/roster').set('x-api-key', ADMIN_KEY);
      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Server misconfiguration' });
    });
  });

  describe('settings', () => {
    it('updates settings through the admin API', async () => {
      const res = await request(app)
        .put('/admin/settings')
        .set('x-api-key', ADMIN_KEY)
        .send({ fee_rate_bps: 100, grace_period_days: 1 });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ repayment_window_days: 30, fee_rate_bps: 100, grace_period_days: 1 });
    });

    it('applies none of the settings when one is invalid', async () => {
      const res = await request(app)
        .put('/admin/settings')
        .set('x-api-key', ADMIN_KEY)
        .send({ fee_rate_bps: 200, grace_period_days: -1 });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_SETTING');

      const settings = await request(app).get('/v1/settings');
      expect(settings.body).toEqual({ repayment_window_days: 30, fee_rate_bps: 50, grace_period_days: 3 });
    });
  });

  it('answers unknown loans, routes and bad JSON', async () => {
    const missing = await request(app).get('/v1/loans/99');
    expect(missing.status).toBe(404);

    const route = await request(app).get('/v2/nothing');
    expect(route.status).toBe(404);
    expect(route.body).toEqual({ error: 'Not found' });

    const json = await request(app)
      .post('/v1/pool/deposit')
      .set('x-api-key', PROVIDER_KEY)
      .set('Content-Type', 'application/json')
      .send('{"amount":');
    expect(json.status).toBe(400);
    expect(json.body).toEqual({ error: 'Malformed JSON body' });
  });
});
