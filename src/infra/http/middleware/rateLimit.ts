import rateLimit from 'express-rate-limit';

const ONE_MINUTE_MS = 60 * 1000;

/**
 * General API limit, 60 requests per minute per client.
 * In-memory store: counters are per app instance and reset on restart.
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: ONE_MINUTE_MS,
    limit: 60,
    standardHeaders: true,
    legacyHeaders: false,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
  });
}

/**
 * Login attempts, 10 per minute per IP.
 */
export function createLoginRateLimiter() {
  return rateLimit({
    windowMs: ONE_MINUTE_MS,
    limit: 10,
    standardHeaders: true,
    legacyHeaders: false,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
  });
}
