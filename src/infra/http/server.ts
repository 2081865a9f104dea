import { loadConfig } from '../config.js';
import { createPool } from '../db/pool.js';
import { PgTransactionRunner } from '../db/transactionRunner.js';
import { PgCourseQueries } from '../db/courseQueriesRepo.js';
import { UserRepo } from '../db/userRepo.js';
import { createApp } from './app.js';

const config = loadConfig();
const pool = createPool(config.databaseUrl);

const app = createApp({
  transactions: new PgTransactionRunner(pool),
  courseQueries: new PgCourseQueries(pool),
  users: new UserRepo(pool),
  tokens: {
    secret: config.jwtSecret,
    expiresInSeconds: config.jwtExpiresInSeconds,
  },
  healthCheck: () => pool.query('SELECT 1'),
});

const server = app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Error closing database pool:', error);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
