import type { TokenManager, UserRepository } from '../../domain/auth/ports.js';
import type { User } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';

/**
 * Resolves a bearer token to the user it was issued for.
 */
export class AuthenticateUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenManager
  ) {}

  async execute(token: string): Promise<User> {
    const claims = this.tokens.decodeToken(token);
    const user = await this.userRepo.findByEmail(claims.sub);
    if (!user) {
      throw new UnauthorizedError('Could not validate credentials');
    }
    return user;
  }
}
