/**
 * BNPL Credit Protocol - Authentication Middleware
 * API keys resolve to the protocol address that acts as `caller`.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ActorApiKey } from '../../config';
import { Address, isAddress } from '../../shared/types';

function readApiKey(req: Request): string | undefined {
  const header = req.headers['x-api-key'];
  return typeof header === 'string' && header !== '' ? header : undefined;
}

/**
 * Actor endpoints: the key maps to a borrower, merchant or liquidity provider
 */
export function actorAuthMiddleware(keys: readonly ActorApiKey[]): RequestHandler {
  const byKey = new Map(keys.map((entry) => [entry.key, entry.address]));

  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = readApiKey(req);
    if (!apiKey) {
      res.status(401).json({ error: 'Missing API key' });
      return;
    }

    const address = byKey.get(apiKey);
    if (!address) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    res.locals.actor = address;
    next();
  };
}

/**
 * Admin endpoints: the admin key acts as the current roster admin
 */
export function adminAuthMiddleware(expectedKey: string | undefined, adminAddress: () => Address): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedKey) {
      console.error('[Auth] ADMIN_API_KEY not configured');
      res.status(500).json({ error: 'Server misconfiguration' });
      return;
    }

    const apiKey = readApiKey(req);
    if (!apiKey) {
      res.status(401).json({ error: 'Missing API key' });
      return;
    }

    if (apiKey !== expectedKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    res.locals.actor = adminAddress();
    next();
  };
}

/**
 * The authenticated caller set by one of the middlewares above
 */
export function getActor(res: Response): Address {
  const actor: unknown = res.locals.actor;
  if (typeof actor !== 'string' || !isAddress(actor)) {
    throw new Error('Route reached without an authenticated actor');
  }
  return actor;
}
