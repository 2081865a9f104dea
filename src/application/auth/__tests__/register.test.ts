import { describe, it, expect, beforeEach } from 'vitest';
import { RegisterUseCase } from '../register.js';
import { ConflictError } from '../../errors.js';
import { Password } from '../../../domain/auth/password.js';
import { InMemoryUserStore } from './support/inMemoryUserStore.js';

describe('RegisterUseCase', () => {
  let users: InMemoryUserStore;
  let useCase: RegisterUseCase;

  beforeEach(() => {
    users = new InMemoryUserStore();
    useCase = new RegisterUseCase(users);
  });

  it('should create a student with a hashed password', async () => {
    const result = await useCase.execute({
      username: 'alice',
      password: 'password123',
      name: 'Alice',
      email: 'alice@example.com',
    });

    expect(result).toEqual({
      userId: expect.any(String),
      username: 'alice',
      name: 'Alice',
      role: 'student',
    });

    const stored = await users.findById(result.userId);
    expect(stored?.email).toBe('alice@example.com');
    expect(stored?.passwordHash).not.toBe('password123');
    expect(await Password.verify('password123', stored?.passwordHash ?? '')).toBe(true);
  });

  it('should store a missing email as null', async () => {
    const result = await useCase.execute({ username: 'bob', password: 'password123', name: 'Bob' });

    expect((await users.findById(result.userId))?.email).toBeNull();
  });

  it('should reject a taken username', async () => {
    await useCase.execute({ username: 'alice', password: 'password123', name: 'Alice' });

    await expect(
      useCase.execute({ username: 'alice', password: 'password456', name: 'Other Alice' })
    ).rejects.toThrow(new ConflictError('User with this username already exists'));
  });
});
