import type { Pool } from 'pg';
import { isUserRole, User } from '../../domain/auth/user.js';
import { ConflictError } from '../../application/errors.js';
import type { NewUser, UserStore } from '../../application/auth/ports.js';

interface UserRow {
  id: string;
  username: string;
  name: string;
  email: string | null;
  role: string;
  password_hash: string;
  created_at: Date;
}

const USER_COLUMNS = 'id, username, name, email, role, password_hash, created_at';

function mapUser(row: UserRow): User {
  if (!isUserRole(row.role)) {
    throw new Error(`Invalid role ${row.role} for user ${row.id}`);
  }

  return {
    id: row.id,
    username: row.username,
    name: row.name,
    email: row.email,
    role: row.role,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class UserRepo implements UserStore {
  constructor(private db: Pool) {}

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );

    return result.rows.length === 0 ? null : mapUser(result.rows[0]);
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    return result.rows.length === 0 ? null : mapUser(result.rows[0]);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `INSERT INTO users (username, name, email, role, password_hash)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [user.username, user.name, user.email, user.role, user.passwordHash]
      );

      return mapUser(result.rows[0]);
    } catch (error: unknown) {
      // Lost a race with a concurrent registration of the same username
      if (error && typeof error === 'object' && 'code' in error && error.code === '23505') {
        throw new ConflictError('User with this username already exists');
      }
      throw error;
    }
  }
}
