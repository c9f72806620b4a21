import { hash, verify } from 'argon2';
import type { PasswordHasher } from './ports.js';

/**
 * Password hashing using Argon2 (more secure than bcrypt).
 */
export class Argon2PasswordHasher implements PasswordHasher {
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * A malformed stored hash counts as a mismatch.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
