import type { PasswordHasher, TokenManager, UserRepository } from '../../domain/auth/ports.js';
import { normalizeEmail } from '../../domain/auth/user.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher,
    private tokens: TokenManager
  ) {}

  /**
   * Bad credentials are an ordinary outcome and resolve to null; only real
   * failures reject.
   */
  async execute(command: LoginCommand): Promise<LoginResult | null> {
    const user = await this.userRepo.findByEmail(normalizeEmail(command.email));
    if (!user) {
      return null;
    }

    const isValid = await this.hasher.verify(command.password, user.passwordHash);
    if (!isValid) {
      return null;
    }

    await this.userRepo.update({ ...user, lastLogin: new Date() });

    const accessToken = this.tokens.createAccessToken({
      sub: user.email,
      role: user.role,
    });

    return { accessToken, tokenType: 'bearer' };
  }
}
