import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import type { Pool } from 'pg';
import { createPool } from './pool.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

// Arbitrary key shared by every migrate run, so two runs never interleave
const MIGRATION_LOCK_KEY = 72_410_001;

interface Migration {
  filename: string;
  version: number;
}

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

/**
 * Apply every pending migration, each in its own transaction.
 * Returns the versions applied by this run.
 */
export async function runMigrations(db: Pool, dir: string = MIGRATIONS_DIR): Promise<number[]> {
  const client = await db.connect();
  const appliedNow: number[] = [];

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);

    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const appliedResult = await client.query<{ version: number }>(
      'SELECT version FROM schema_migrations ORDER BY version'
    );
    const applied = new Set(appliedResult.rows.map((row) => row.version));

    const pending = (await listMigrations(dir)).filter((m) => !applied.has(m.version));
    if (pending.length === 0) {
      console.log('No pending migrations.');
      return appliedNow;
    }

    console.log(`Found ${pending.length} pending migration(s)`);

    for (const migration of pending) {
      const sql = await readFile(join(dir, migration.filename), 'utf-8');

      try {
        await client.query('BEGIN');
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
          migration.version,
        ]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }

      appliedNow.push(migration.version);
      console.log(`✓ Applied migration ${migration.version}: ${migration.filename}`);
    }

    return appliedNow;
  } finally {
    await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    client.release();
  }
}

async function main(): Promise<void> {
  const pool = createPool(process.env.DATABASE_URL);

  try {
    console.log('Starting migrations...');
    await runMigrations(pool);
    console.log('All migrations applied successfully.');
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
