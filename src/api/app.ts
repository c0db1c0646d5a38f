/**
 * BNPL Credit Protocol - HTTP Application
 *
 * API SURFACE:
 * - GET  /health
 * - /v1/*    public reads, actor actions (x-api-key -> actor address)
 * - /admin/* admin operations (x-api-key = ADMIN_API_KEY)
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { ActorApiKey } from '../config';
import { AssetCustody, InMemoryCustody } from '../modules/custody';
import { BnplProtocol } from '../protocol';
import { actorAuthMiddleware, adminAuthMiddleware } from './middleware/auth.middleware';
import { createAdminRoutes } from './routes/admin.routes';
import { createCustodyRoutes } from './routes/custody.routes';
import { createLoanRoutes } from './routes/loans.routes';
import { createPoolRoutes } from './routes/pool.routes';

export interface AppOptions {
  adminApiKey?: string;
  actorKeys: readonly ActorApiKey[];
  rateLimitRpm: number;
  /** Mounts faucet / approval routes for the in-memory custody asset */
  devCustody?: InMemoryCustody;
}

export function createApp(protocol: BnplProtocol<AssetCustody>, options: AppOptions): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));
  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      max: options.rateLimitRpm,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests' },
    })
  );

  const actorAuth = actorAuthMiddleware(options.actorKeys);
  const adminAuth = adminAuthMiddleware(options.adminApiKey, () => protocol.roster.getAdmin());

  // Health check (public)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'OK',
      service: 'bnpl-credit-protocol',
      custody: protocol.custody.name,
      event_mirror: protocol.eventMirror.name,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/v1', createLoanRoutes(protocol.orchestrator, protocol.creditLedger, protocol.defaultDetector, actorAuth));
  app.use('/v1/pool', createPoolRoutes(protocol.liquidityLedger, actorAuth));
  if (options.devCustody) {
    app.use(
      '/v1/custody',
      createCustodyRoutes(protocol.runtime, options.devCustody, protocol.liquidityLedger.address, actorAuth)
    );
  }
  app.use('/admin', adminAuth, createAdminRoutes(protocol, options.devCustody));

  // 404
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler (malformed JSON bodies and anything thrown synchronously)
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    console.error('[Error]', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
