import type { Pool } from 'pg';
import type { EnrollmentTransaction, TransactionRunner } from '../../application/enrollment/ports.js';
import { PgCatalogStore } from './catalogStore.js';
import { PgEnrollmentStore } from './enrollmentStore.js';

/**
 * The part of a pooled connection needed to end a failed transaction.
 */
export interface ReleasableClient {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * Roll back and return the connection to the pool. When the rollback itself
 * fails the connection is in an unknown state, so it is released with the
 * error and the pool destroys it instead of handing it out again.
 */
export async function rollbackAndRelease(client: ReleasableClient): Promise<void> {
  try {
    await client.query('ROLLBACK');
    client.release();
  } catch (rollbackError) {
    console.error('Rollback failed, discarding connection:', rollbackError);
    client.release(rollbackError instanceof Error ? rollbackError : true);
  }
}

/**
 * Runs enrollment work on one pooled connection between BEGIN and
 * COMMIT/ROLLBACK. Row locks taken inside the work are released when the
 * transaction ends.
 */
export class PgTransactionRunner implements TransactionRunner {
  constructor(private db: Pool) {}

  async run<T>(work: (tx: EnrollmentTransaction) => Promise<T>): Promise<T> {
    const client = await this.db.connect();

    try {
      await client.query('BEGIN');
      const result = await work({
        catalog: new PgCatalogStore(client),
        enrollments: new PgEnrollmentStore(client),
      });
      await client.query('COMMIT');
      client.release();
      return result;
    } catch (error) {
      // The caller sees the error that aborted the work, not a rollback failure
      await rollbackAndRelease(client);
      throw error;
    }
  }
}
