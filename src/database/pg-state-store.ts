/**
 * BNPL Credit Protocol - PostgreSQL State Store
 * Reads hydrate from the pool; one protocol operation's dirty records are
 * written in a single transaction on one client.
 */

import { PersistenceSession, StateStore } from '../core/runtime';
import { describeError } from '../shared/errors';

/**
 * The parts of a pg PoolClient a transaction uses
 */
export interface TransactionClient extends PersistenceSession {
  release(err?: Error | boolean): void;
}

/**
 * The parts of a pg Pool the store uses
 */
export interface ConnectionPool extends PersistenceSession {
  connect(): Promise<TransactionClient>;
}

export class PgStateStore implements StateStore {
  constructor(private readonly pool: ConnectionPool) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    return this.pool.query(text, values);
  }

  async transaction(work: (session: PersistenceSession) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    let releaseError: Error | undefined;

    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (error) {
      try {
        await client.query('ROLLBACK');
        console.error('[Database] Transaction rolled back:', error);
      } catch (rollbackError) {
        // Connection state is unknown: the pool must destroy it, not reuse it
        releaseError = rollbackError instanceof Error ? rollbackError : new Error(describeError(rollbackError));
        console.error(`[Database] ROLLBACK failed, discarding connection: ${describeError(rollbackError)}`);
      }
      throw error;
    } finally {
      client.release(releaseError);
    }
  }
}
