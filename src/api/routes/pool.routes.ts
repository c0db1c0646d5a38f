/**
 * BNPL Credit Protocol - Liquidity Pool Routes
 */

import { Router, Request, Response, RequestHandler } from 'express';
import { LiquidityLedgerService } from '../../core/liquidity';
import { getActor } from '../middleware/auth.middleware';
import { handleRouteError } from '../http-errors';
import { AmountBodySchema } from '../schemas';
import { serializePoolState } from '../serializers';

export function createPoolRoutes(liquidityLedger: LiquidityLedgerService, actorAuth: RequestHandler): Router {
  const router = Router();

  const snapshot = () =>
    serializePoolState(
      liquidityLedger.getPoolState(),
      liquidityLedger.getAvailableLiquidity(),
      liquidityLedger.getUtilization()
    );

  /**
   * GET /v1/pool
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      const custodyBalance = await liquidityLedger.getCustodyBalance();
      res.json({ ...snapshot(), custody_balance: custodyBalance.toString() });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /v1/pool/deposit
   * Requires a prior custody approval of the pool for `amount`.
   */
  router.post('/deposit', actorAuth, async (req: Request, res: Response) => {
    try {
      const { amount } = AmountBodySchema.parse(req.body);
      await liquidityLedger.depositLiquidity(getActor(res), amount);
      res.status(201).json(snapshot());
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  return router;
}
