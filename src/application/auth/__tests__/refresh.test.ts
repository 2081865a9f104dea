import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { RefreshTokenUseCase } from '../refresh.js';
import { RegisterUseCase } from '../register.js';
import { UnauthorizedError } from '../../errors.js';
import { InMemoryUserStore } from './support/inMemoryUserStore.js';

describe('RefreshTokenUseCase', () => {
  const tokens = { secret: 'test-secret', expiresInSeconds: 900 };

  it('should sign a new token from the stored user', async () => {
    const users = new InMemoryUserStore();
    const { userId } = await new RegisterUseCase(users).execute({
      username: 'alice',
      password: 'password123',
      name: 'Alice',
    });

    const { token } = await new RefreshTokenUseCase(users, tokens).execute(userId);

    const payload = jwt.verify(token, 'test-secret');
    expect(payload).toMatchObject({ userId, username: 'alice', role: 'student' });
    if (typeof payload === 'object' && payload.exp && payload.iat) {
      expect(payload.exp - payload.iat).toBe(900);
    } else {
      throw new Error('token has no exp/iat');
    }
  });

  it('should reject an unknown user', async () => {
    const useCase = new RefreshTokenUseCase(new InMemoryUserStore(), tokens);

    await expect(useCase.execute('00000000-0000-4000-8000-000000000000')).rejects.toThrow(
      new UnauthorizedError('User no longer exists')
    );
  });
});
