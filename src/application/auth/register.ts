import type { PasswordHasher, UserRepository } from '../../domain/auth/ports.js';
import { createUser, normalizeEmail, type Role, type User } from '../../domain/auth/user.js';
import { UserAlreadyExistsError } from '../errors.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
}

export interface RegisterOptions {
  /** Accounts registered with this email become superadmin. */
  superadminEmail?: string;
}

export class RegisterUseCase {
  private readonly superadminEmail: string | null;

  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher,
    options: RegisterOptions = {}
  ) {
    this.superadminEmail = options.superadminEmail ? normalizeEmail(options.superadminEmail) : null;
  }

  async execute(command: RegisterCommand): Promise<User> {
    const email = normalizeEmail(command.email);
    const username = command.username.trim();

    if (await this.userRepo.findByEmail(email)) {
      throw new UserAlreadyExistsError(`Email ${email} is already registered`);
    }
    if (await this.userRepo.findByUsername(username)) {
      throw new UserAlreadyExistsError(`Username ${username} is already taken`);
    }

    const role: Role = email === this.superadminEmail ? 'superadmin' : 'admin';
    // Validate before paying for the hash
    createUser({ username, email, passwordHash: '', role });
    const passwordHash = await this.hasher.hash(command.password);

    return this.userRepo.save(createUser({ username, email, passwordHash, role }));
  }
}
