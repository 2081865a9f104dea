import type { User, UserRole } from '../../domain/auth/user.js';

export interface NewUser {
  username: string;
  name: string;
  email: string | null;
  role: UserRole;
  passwordHash: string;
}

export interface UserStore {
  findByUsername(username: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  /** Throws ConflictError when the username is taken. */
  create(user: NewUser): Promise<User>;
}
