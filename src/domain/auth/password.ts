import { argon2id, hash, verify } from 'argon2';

/**
 * Password hashing with Argon2id.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { type: argon2id });
  }

  /**
   * Verify a plain password against a stored hash.
   * A malformed hash counts as a mismatch.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
