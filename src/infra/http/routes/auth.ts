import { Router } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase, TokenOptions } from '../../../application/auth/login.js';
import { ProfileQuery } from '../../../application/auth/profile.js';
import { RefreshTokenUseCase } from '../../../application/auth/refresh.js';
import type { UserStore } from '../../../application/auth/ports.js';
import { authMiddleware, getAuth } from '../middleware/auth.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new student account
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password, name]
 *             properties:
 *               username: { type: string, minLength: 3 }
 *               password: { type: string, minLength: 8 }
 *               name: { type: string }
 *               email: { type: string, format: email }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Username already exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a JWT
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a valid token for a new one
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: New token
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: Log out
 *     description: Tokens are stateless; the client discards its token.
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Logged out
 *       401:
 *         description: Unauthorized
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user profile
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const registerBodySchema = z.object({
  username: z.string().trim().min(3).max(150),
  password: z.string().min(8),
  name: z.string().trim().min(1).max(100),
  email: z.string().email().optional(),
});

const loginBodySchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export interface AuthRouteDependencies {
  users: UserStore;
  tokens: TokenOptions;
}

export function createAuthRoutes({ users, tokens }: AuthRouteDependencies) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(users);
  const loginUseCase = new LoginUseCase(users, tokens);
  const profileQuery = new ProfileQuery(users);
  const refreshTokenUseCase = new RefreshTokenUseCase(users, tokens);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await registerUseCase.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/refresh',
    authMiddleware(tokens.secret),
    asyncHandler(async (req, res) => {
      const result = await refreshTokenUseCase.execute(getAuth(req).userId);
      res.json(result);
    })
  );

  router.post('/logout', authMiddleware(tokens.secret), (_req, res) => {
    res.json({ message: 'Logged out' });
  });

  router.get(
    '/me',
    authMiddleware(tokens.secret),
    asyncHandler(async (req, res) => {
      const profile = await profileQuery.execute(getAuth(req).userId);
      res.json(profile);
    })
  );

  return router;
}
