import { UnauthorizedError } from '../errors.js';
import { signToken, TokenOptions } from './login.js';
import type { UserStore } from './ports.js';

export interface RefreshResult {
  token: string;
}

/**
 * Issue a fresh token for the holder of a still-valid one. Claims are
 * re-read from the store, so a deleted account cannot refresh.
 */
export class RefreshTokenUseCase {
  constructor(
    private users: UserStore,
    private tokens: TokenOptions
  ) {}

  async execute(userId: string): Promise<RefreshResult> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new UnauthorizedError('User no longer exists');
    }
    return { token: signToken(user, this.tokens) };
  }
}
