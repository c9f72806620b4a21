import { UnauthorizedError } from '../application/errors.js';
import type { ImageStorage, StoredImage } from '../application/images/uploadImage.js';
import { buildServices, type AppServices } from '../application/services.js';
import type { AccessTokenClaims, PasswordHasher, TokenManager } from '../domain/auth/ports.js';
import { ROLES, type Role } from '../domain/auth/user.js';
import {
  createInMemoryRepositories,
  type InMemoryRepositories,
} from '../infra/memory/repositories.js';

/** Reversible stand-in for argon2: "hashed:<plain>". */
export class FakePasswordHasher implements PasswordHasher {
  async hash(plainPassword: string): Promise<string> {
    return `hashed:${plainPassword}`;
  }

  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    return passwordHash === `hashed:${plainPassword}`;
  }
}

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

/** Tokens are "token|<sub>|<role>". */
export class FakeTokenManager implements TokenManager {
  readonly issued: AccessTokenClaims[] = [];

  createAccessToken(claims: AccessTokenClaims): string {
    this.issued.push(claims);
    return `token|${claims.sub}|${claims.role}`;
  }

  decodeToken(token: string): AccessTokenClaims {
    const [prefix, sub, role] = token.split('|');
    if (prefix !== 'token' || !sub || !role || !isRole(role)) {
      throw new UnauthorizedError('Could not validate credentials');
    }
    return { sub, role };
  }
}

export class FakeImageStorage implements ImageStorage {
  readonly stored: { key: string; body: Buffer; contentType: string }[] = [];

  async put(key: string, body: Buffer, contentType: string): Promise<StoredImage> {
    this.stored.push({ key, body, contentType });
    return { key, url: `https://cdn.test/${key}` };
  }
}

export interface TestContext {
  repos: InMemoryRepositories;
  services: AppServices;
  tokens: FakeTokenManager;
  imageStorage: FakeImageStorage;
}

export function createTestContext(options: { superadminEmail?: string } = {}): TestContext {
  const repos = createInMemoryRepositories();
  const tokens = new FakeTokenManager();
  const imageStorage = new FakeImageStorage();
  const services = buildServices(
    repos,
    { hasher: new FakePasswordHasher(), tokens },
    { superadminEmail: options.superadminEmail, imageStorage }
  );
  return { repos, services, tokens, imageStorage };
}

/**
 * Register a user and give them a profile. Returns both ids.
 */
export async function seedUserWithProfile(
  services: AppServices,
  username: string
): Promise<{ userId: number; profileId: number }> {
  const user = await services.register.execute({
    username,
    email: `${username}@example.com`,
    password: 'password123',
  });
  const profile = await services.profiles.createProfile(user.id, {
    name: username,
    lastName: 'Tester',
    email: user.email,
  });
  return { userId: user.id, profileId: profile.id };
}
