import jwt from 'jsonwebtoken';
import { Password } from '../../domain/auth/password.js';
import { toProfile, User, UserProfile } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';
import type { UserStore } from './ports.js';

export interface LoginCommand {
  username: string;
  password: string;
}

export interface LoginResult {
  token: string;
  user: UserProfile;
}

export interface TokenOptions {
  secret: string;
  /** Token lifetime in seconds. */
  expiresInSeconds: number;
}

export function signToken(user: User, tokens: TokenOptions): string {
  return jwt.sign(
    {
      userId: user.id,
      username: user.username,
      role: user.role,
    },
    tokens.secret,
    {
      expiresIn: tokens.expiresInSeconds,
    }
  );
}

export class LoginUseCase {
  constructor(
    private users: UserStore,
    private tokens: TokenOptions
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.users.findByUsername(command.username);
    if (!user) {
      throw new UnauthorizedError('Invalid username or password');
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError('Invalid username or password');
    }

    return {
      token: signToken(user, this.tokens),
      user: toProfile(user),
    };
  }
}
