/**
 * BNPL Credit Protocol - Main Entry Point
 *
 * Borrowers draw short-term credit to pay merchants instantly; merchants are
 * paid from a shared liquidity pool; overdue loans are detected and defaulted.
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { loadConfig, parseActorApiKeys } from './config';
import { getPool, testConnection, closePool, PgStateStore } from './database';
import { ConsoleEventMirror, EventMirror, HttpEventMirror } from './modules/events';
import { InMemoryCustody } from './modules/custody';
import { createBnplProtocol } from './protocol';
import { createApp } from './api';

async function bootstrap(): Promise<void> {
  console.log('='.repeat(60));
  console.log('  BNPL CREDIT PROTOCOL');
  console.log('  Loan Orchestrator | Credit Ledger | Liquidity Ledger | Default Detector');
  console.log('='.repeat(60));

  const config = loadConfig();
  const actorKeys = parseActorApiKeys(config.ACTOR_API_KEYS);

  // Test database connection
  console.log('\n[Boot] Testing database connection...');
  const dbConnected = await testConnection(config.DATABASE_URL);
  if (!dbConnected) {
    console.error('[Boot] FATAL: Database connection failed');
    process.exit(1);
  }
  const pool = getPool(config.DATABASE_URL);

  const eventMirror: EventMirror = config.EVENT_MIRROR_URL
    ? new HttpEventMirror(config.EVENT_MIRROR_URL)
    : new ConsoleEventMirror();

  console.log('[Boot] Initializing protocol...');
  const protocol = await createBnplProtocol({
    admin: config.ADMIN_ADDRESS,
    addresses: {
      orchestrator: config.ORCHESTRATOR_ADDRESS,
      creditLedger: config.CREDIT_LEDGER_ADDRESS,
      liquidityLedger: config.LIQUIDITY_LEDGER_ADDRESS,
      defaultDetector: config.DEFAULT_DETECTOR_ADDRESS,
    },
    createCustody: (runtime) =>
      new InMemoryCustody(runtime, { operators: [config.DEFAULT_DETECTOR_ADDRESS] }),
    eventMirror,
    settings: {
      repaymentWindowDays: config.REPAYMENT_WINDOW_DAYS,
      feeRateBps: config.FEE_RATE_BPS,
      gracePeriodDays: config.GRACE_PERIOD_DAYS,
    },
    store: pool ? new PgStateStore(pool) : undefined,
  });

  console.log('[Boot] Configuring Express server...');
  const app = createApp(protocol, {
    adminApiKey: config.ADMIN_API_KEY,
    actorKeys,
    rateLimitRpm: config.RATE_LIMIT_RPM,
    devCustody: protocol.custody,
  });

  const server = app.listen(config.PORT, () => {
    console.log(`\n[Boot] Server listening on port ${config.PORT}`);
    console.log('[Boot] Endpoints:');
    console.log(`  - Health: http://localhost:${config.PORT}/health`);
    console.log(`  - Public/actor: http://localhost:${config.PORT}/v1/*`);
    console.log(`  - Admin: http://localhost:${config.PORT}/admin/*`);
    console.log(`[Boot] ${actorKeys.length} actor key(s) loaded`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
    });

    await closePool();

    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('[Shutdown] Error during shutdown:', error);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  console.log('\n[Boot] BNPL CREDIT PROTOCOL ONLINE');
}

// Run
bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
