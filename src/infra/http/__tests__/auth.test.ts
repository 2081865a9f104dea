import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import jwt from 'jsonwebtoken';
import type express from 'express';
import { createTestApp, JWT_SECRET, tokenFor } from './support/testApp.js';

describe('Auth API', () => {
  let app: express.Application;

  beforeEach(() => {
    ({ app } = createTestApp());
  });

  async function register(username = 'alice') {
    return request(app).post('/api/auth/register').send({
      username,
      password: 'password123',
      name: 'Alice Example',
      email: 'alice@example.com',
    });
  }

  describe('POST /api/auth/register', () => {
    it('should register a student', async () => {
      const response = await register();

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        userId: expect.any(String),
        username: 'alice',
        name: 'Alice Example',
        role: 'student',
      });
    });

    it('should reject a short password', async () => {
      const response = await request(app).post('/api/auth/register').send({
        username: 'alice',
        password: 'short',
        name: 'Alice',
      });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details.issues[0].path).toBe('password');
    });

    it('should reject a duplicate username', async () => {
      await register();
      const response = await register();

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'CONFLICT',
        message: 'User with this username already exists',
      });
    });
  });

  describe('POST /api/auth/login', () => {
    it('should return a token for valid credentials', async () => {
      const registered = await register();

      const response = await request(app)
        .post('/api/auth/login')
        .send({ username: 'alice', password: 'password123' });

      expect(response.status).toBe(200);
      expect(jwt.verify(response.body.token, JWT_SECRET)).toMatchObject({
        userId: registered.body.userId,
        role: 'student',
      });
      expect(response.body.user.username).toBe('alice');
      expect(response.body.user).not.toHaveProperty('passwordHash');
    });

    it('should reject a wrong password', async () => {
      await register();

      const response = await request(app)
        .post('/api/auth/login')
        .send({ username: 'alice', password: 'wrong-password' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Invalid username or password',
      });
    });

    it('should rate limit repeated attempts', async () => {
      const statuses: number[] = [];
      for (let i = 0; i < 11; i++) {
        const response = await request(app)
          .post('/api/auth/login')
          .send({ username: 'nobody', password: 'password123' });
        statuses.push(response.status);
      }

      expect(statuses.slice(0, 10).every((s) => s === 401)).toBe(true);
      expect(statuses[10]).toBe(429);
    });
  });

  describe('POST /api/auth/refresh', () => {
    it('should issue a new token for a valid one', async () => {
      const registered = await register();
      const login = await request(app)
        .post('/api/auth/login')
        .send({ username: 'alice', password: 'password123' });

      const response = await request(app)
        .post('/api/auth/refresh')
        .set('Authorization', `Bearer ${login.body.token}`);

      expect(response.status).toBe(200);
      expect(jwt.verify(response.body.token, JWT_SECRET)).toMatchObject({
        userId: registered.body.userId,
        username: 'alice',
        role: 'student',
      });
    });

    it('should refuse a token whose user no longer exists', async () => {
      const response = await request(app)
        .post('/api/auth/refresh')
        .set('Authorization', `Bearer ${tokenFor('student')}`);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'User no longer exists' });
    });

    it('should require a token', async () => {
      const response = await request(app).post('/api/auth/refresh');

      expect(response.status).toBe(401);
    });
  });

  describe('POST /api/auth/logout', () => {
    it('should acknowledge an authenticated caller', async () => {
      const response = await request(app)
        .post('/api/auth/logout')
        .set('Authorization', `Bearer ${tokenFor('teacher')}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ message: 'Logged out' });
    });

    it('should require a token', async () => {
      const response = await request(app).post('/api/auth/logout');

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('UNAUTHORIZED');
    });
  });

  describe('GET /api/auth/me', () => {
    it('should return the profile of the token holder', async () => {
      await register();
      const login = await request(app)
        .post('/api/auth/login')
        .send({ username: 'alice', password: 'password123' });

      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${login.body.token}`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        username: 'alice',
        name: 'Alice Example',
        email: 'alice@example.com',
        role: 'student',
      });
    });

    it('should reject an expired token', async () => {
      const expired = jwt.sign(
        {
          userId: '00000000-0000-4000-8000-000000000000',
          username: 'alice',
          role: 'student',
          exp: Math.floor(Date.now() / 1000) - 60,
        },
        JWT_SECRET
      );

      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${expired}`);

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Invalid or expired token');
    });

    it('should reject a token with unexpected claims', async () => {
      const token = jwt.sign({ userId: 'not-a-uuid', username: 'alice', role: 'student' }, JWT_SECRET);

      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
    });
  });
});
