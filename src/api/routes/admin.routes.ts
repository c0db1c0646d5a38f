/**
 * BNPL Credit Protocol - Admin API Routes
 * Credit limits, pool treasury, settings, default checks and the roster.
 */

import { Router, Request, Response } from 'express';
import { CAPABILITIES } from '../../core/access';
import { AssetCustody, InMemoryCustody } from '../../modules/custody';
import { BnplProtocol } from '../../protocol';
import { getActor } from '../middleware/auth.middleware';
import { handleRouteError } from '../http-errors';
import {
  AddressSchema,
  BatchDefaultCheckSchema,
  BatchLimitsSchema,
  DefaultCheckSchema,
  GrantSchema,
  MintSchema,
  SetLimitSchema,
  SettingsUpdateSchema,
  TransferAdminSchema,
  WithdrawSchema,
} from '../schemas';
import { serializeCreditAccount, serializePoolState, serializeSettings } from '../serializers';

export function createAdminRoutes(protocol: BnplProtocol<AssetCustody>, devCustody?: InMemoryCustody): Router {
  const router = Router();
  const { runtime, roster, creditLedger, liquidityLedger, orchestrator, defaultDetector } = protocol;

  // ============================================================================
  // CREDIT
  // ============================================================================

  /**
   * POST /admin/credit/limits
   */
  router.post('/credit/limits', async (req: Request, res: Response) => {
    try {
      const { user, limit } = SetLimitSchema.parse(req.body);
      await creditLedger.setLimit(getActor(res), user, limit);
      res.json(serializeCreditAccount(creditLedger.getAccount(user), creditLedger.getAvailable(user), creditLedger.getUtilization(user)));
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /admin/credit/limits/batch
   */
  router.post('/credit/limits/batch', async (req: Request, res: Response) => {
    try {
      const { users, limits } = BatchLimitsSchema.parse(req.body);
      const updated = await creditLedger.batchSetLimits(getActor(res), users, limits);
      res.json({ updated });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /admin/credit/:user/unblock
   */
  router.post('/credit/:user/unblock', async (req: Request, res: Response) => {
    try {
      const user = AddressSchema.parse(req.params.user);
      await creditLedger.unblock(getActor(res), user);
      res.json({ user, defaulted: creditLedger.isDefaulted(user) });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  // ============================================================================
  // POOL TREASURY
  // ============================================================================

  const poolSnapshot = () =>
    serializePoolState(liquidityLedger.getPoolState(), liquidityLedger.getAvailableLiquidity(), liquidityLedger.getUtilization());

  /**
   * POST /admin/pool/withdraw
   */
  router.post('/pool/withdraw', async (req: Request, res: Response) => {
    try {
      const { amount, recipient } = WithdrawSchema.parse(req.body);
      await liquidityLedger.withdrawLiquidity(getActor(res), amount, recipient);
      res.json(poolSnapshot());
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /admin/pool/withdraw-fees
   */
  router.post('/pool/withdraw-fees', async (req: Request, res: Response) => {
    try {
      const { amount, recipient } = WithdrawSchema.parse(req.body);
      await liquidityLedger.withdrawFees(getActor(res), amount, recipient);
      res.json(poolSnapshot());
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  // ============================================================================
  // SETTINGS
  // ============================================================================

  /**
   * PUT /admin/settings
   * Applies the provided settings together: one invalid value rejects them all.
   */
  router.put('/settings', async (req: Request, res: Response) => {
    try {
      const body = SettingsUpdateSchema.parse(req.body);
      const caller = getActor(res);

      await runtime.execute('Admin.updateSettings', async () => {
        if (body.repayment_window_days !== undefined) {
          await orchestrator.setRepaymentWindow(caller, body.repayment_window_days);
        }
        if (body.fee_rate_bps !== undefined) {
          await orchestrator.setFeeRate(caller, body.fee_rate_bps);
        }
        if (body.grace_period_days !== undefined) {
          await defaultDetector.setGracePeriod(caller, body.grace_period_days);
        }
      });

      res.json(serializeSettings(orchestrator.getSettings(), defaultDetector.getGracePeriod()));
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  // ============================================================================
  // DEFAULTS
  // ============================================================================

  /**
   * POST /admin/defaults/check
   */
  router.post('/defaults/check', async (req: Request, res: Response) => {
    try {
      const { user, loan_id } = DefaultCheckSchema.parse(req.body);
      const defaulted = await defaultDetector.checkAndProcessDefault(getActor(res), user, loan_id);
      res.json({ loan_id, defaulted });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /admin/defaults/batch
   */
  router.post('/defaults/batch', async (req: Request, res: Response) => {
    try {
      const { users, loan_ids } = BatchDefaultCheckSchema.parse(req.body);
      const processed = await defaultDetector.batchCheckDefaults(getActor(res), users, loan_ids);
      res.json({ processed });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  // ============================================================================
  // ACCESS ROSTER
  // ============================================================================

  /**
   * GET /admin/roster
   */
  router.get('/roster', (_req: Request, res: Response) => {
    const grants: Record<string, string | null> = {};
    for (const capability of CAPABILITIES) {
      grants[capability] = roster.holderOf(capability);
    }
    res.json({ admin: roster.getAdmin(), grants });
  });

  /**
   * POST /admin/roster/grant
   */
  router.post('/roster/grant', async (req: Request, res: Response) => {
    try {
      const { capability, holder } = GrantSchema.parse(req.body);
      await roster.grant(getActor(res), capability, holder);
      res.json({ capability, holder });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /admin/roster/transfer-admin
   */
  router.post('/roster/transfer-admin', async (req: Request, res: Response) => {
    try {
      const { next } = TransferAdminSchema.parse(req.body);
      await roster.transferAdmin(getActor(res), next);
      res.json({ admin: roster.getAdmin() });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  // ============================================================================
  // DEV CUSTODY
  // ============================================================================

  if (devCustody) {
    /**
     * POST /admin/custody/mint
     * Faucet for the in-memory custody asset.
     */
    router.post('/custody/mint', async (req: Request, res: Response) => {
      try {
        const { account, amount } = MintSchema.parse(req.body);
        await runtime.execute('Custody.mint', async () => devCustody.mint(account, amount));
        res.json({ account, balance: (await devCustody.balanceOf(account)).toString() });
      } catch (error) {
        handleRouteError(res, error);
      }
    });
  }

  return router;
}
