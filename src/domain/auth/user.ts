export const USER_ROLES = ['student', 'teacher', 'admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export function isUserRole(value: string): value is UserRole {
  return (USER_ROLES as readonly string[]).includes(value);
}

/**
 * User domain entity. Students are users with role 'student'.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly name: string;
  readonly email: string | null;
  readonly role: UserRole;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

/**
 * User without credentials, safe to return from the API.
 */
export type UserProfile = Omit<User, 'passwordHash'>;

export function toProfile(user: User): UserProfile {
  return {
    id: user.id,
    username: user.username,
    name: user.name,
    email: user.email,
    role: user.role,
    createdAt: user.createdAt,
  };
}
