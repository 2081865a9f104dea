import { Password } from '../../domain/auth/password.js';
import type { UserRole } from '../../domain/auth/user.js';
import { ConflictError } from '../errors.js';
import type { UserStore } from './ports.js';

export interface RegisterCommand {
  username: string;
  password: string;
  name: string;
  email?: string;
}

export interface RegisterResult {
  userId: string;
  username: string;
  name: string;
  role: UserRole;
}

/**
 * Self-service registration. Accounts created here are always students;
 * teachers and admins come from seeded data.
 */
export class RegisterUseCase {
  constructor(private users: UserStore) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const existing = await this.users.findByUsername(command.username);
    if (existing) {
      throw new ConflictError('User with this username already exists');
    }

    const passwordHash = await Password.hash(command.password);

    const user = await this.users.create({
      username: command.username,
      name: command.name,
      email: command.email ?? null,
      role: 'student',
      passwordHash,
    });

    return {
      userId: user.id,
      username: user.username,
      name: user.name,
      role: user.role,
    };
  }
}
