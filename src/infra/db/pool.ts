import pg from 'pg';
import dotenv from 'dotenv';

dotenv.config();

const { Pool } = pg;

export function createPool(connectionString: string | undefined): pg.Pool {
  const db = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  db.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return db;
}
