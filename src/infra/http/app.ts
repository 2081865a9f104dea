import express from 'express';
import type { TokenOptions } from '../../application/auth/login.js';
import type { UserStore } from '../../application/auth/ports.js';
import type { CourseQueryStore, TransactionRunner } from '../../application/enrollment/ports.js';
import { createAuthRoutes } from './routes/auth.js';
import { createCourseRoutes } from './routes/courses.js';
import { createEnrollmentRoutes } from './routes/enrollments.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

export interface AppDependencies {
  transactions: TransactionRunner;
  courseQueries: CourseQueryStore;
  users: UserStore;
  tokens: TokenOptions;
  /** Resolves when the database answers; used by /healthz. */
  healthCheck: () => Promise<unknown>;
}

const HEALTH_CHECK_TIMEOUT_MS = 2000;

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const app = express();

  app.use(express.json());
  app.use(createApiRateLimiter());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.healthCheck(), HEALTH_CHECK_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  app.use('/api/auth', createAuthRoutes({ users: deps.users, tokens: deps.tokens }));
  app.use(
    '/api/courses',
    createCourseRoutes({
      courseQueries: deps.courseQueries,
      transactions: deps.transactions,
      jwtSecret: deps.tokens.secret,
    })
  );
  app.use(
    '/api/enrollments',
    createEnrollmentRoutes({
      transactions: deps.transactions,
      courseQueries: deps.courseQueries,
      jwtSecret: deps.tokens.secret,
    })
  );

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
