import type { NewUser, Role, User } from './user.js';

export interface UserRepository {
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  save(user: NewUser): Promise<User>;
  update(user: User): Promise<User>;
}

export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, passwordHash: string): Promise<boolean>;
}

/**
 * Claims carried by an access token. `sub` is the user's email.
 */
export interface AccessTokenClaims {
  sub: string;
  role: Role;
}

export interface TokenManager {
  /**
   * Sign an access token. Without `ttlSeconds` the manager's default
   * lifetime applies.
   */
  createAccessToken(claims: AccessTokenClaims, ttlSeconds?: number): string;
  /** Throws UnauthorizedError when the token is invalid or expired. */
  decodeToken(token: string): AccessTokenClaims;
}
