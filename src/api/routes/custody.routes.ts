/**
 * BNPL Credit Protocol - Dev Custody Routes
 * Only mounted when the protocol runs on the in-memory custody asset.
 */

import { Router, Request, Response, RequestHandler } from 'express';
import { ProtocolRuntime } from '../../core/runtime';
import { InMemoryCustody } from '../../modules/custody';
import { Address } from '../../shared/types';
import { getActor } from '../middleware/auth.middleware';
import { handleRouteError } from '../http-errors';
import { AddressSchema, AmountBodySchema } from '../schemas';

export function createCustodyRoutes(
  runtime: ProtocolRuntime,
  custody: InMemoryCustody,
  poolAddress: Address,
  actorAuth: RequestHandler
): Router {
  const router = Router();

  /**
   * GET /v1/custody/:address
   */
  router.get('/:address', async (req: Request, res: Response) => {
    try {
      const account = AddressSchema.parse(req.params.address);
      res.json({
        account,
        balance: (await custody.balanceOf(account)).toString(),
        pool_allowance: custody.allowance(account, poolAddress).toString(),
        frozen: custody.isFrozen(account),
      });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /v1/custody/approve
   * Allow the pool to pull up to `amount` from the caller (deposits, repayments).
   */
  router.post('/approve', actorAuth, async (req: Request, res: Response) => {
    try {
      const { amount } = AmountBodySchema.parse(req.body);
      const owner = getActor(res);
      await runtime.execute('Custody.approve', async () => custody.approve(owner, poolAddress, amount));
      res.json({ owner, spender: poolAddress, allowance: amount.toString() });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  return router;
}
