import { toProfile, UserProfile } from '../../domain/auth/user.js';
import { NotFoundError } from '../errors.js';
import type { UserStore } from './ports.js';

export class ProfileQuery {
  constructor(private users: UserStore) {}

  async execute(userId: string): Promise<UserProfile> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toProfile(user);
  }
}
