import { ValidationError } from '../errors.js';

export const ROLES = ['admin', 'superadmin'] as const;
export type Role = (typeof ROLES)[number];

const ROLE_RANK: Record<Role, number> = {
  admin: 1,
  superadmin: 2,
};

/**
 * Superadmin carries every admin permission, so gates compare ranks rather
 * than role names.
 */
export function hasAtLeastRole(role: Role, required: Role): boolean {
  return ROLE_RANK[role] >= ROLE_RANK[required];
}

export const USERNAME_MIN_LENGTH = 3;

export interface User {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly lastLogin: Date | null;
  readonly createdAt: Date;
}

export interface NewUser {
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Build a user ready to be stored. Throws ValidationError on a malformed
 * email or a username that is too short.
 */
export function createUser(input: NewUser): NewUser {
  const email = normalizeEmail(input.email);
  if (!email.includes('@')) {
    throw new ValidationError('Email must be a valid address', 'email');
  }

  const username = input.username.trim();
  if (username.length < USERNAME_MIN_LENGTH) {
    throw new ValidationError(
      `Username must be at least ${USERNAME_MIN_LENGTH} characters`,
      'username'
    );
  }

  return {
    username,
    email,
    passwordHash: input.passwordHash,
    role: input.role,
  };
}

/** Public view of a user: never exposes the password hash. */
export interface UserView {
  id: number;
  username: string;
  email: string;
  role: Role;
  lastLogin: Date | null;
  createdAt: Date;
}

export function toUserView(user: User): UserView {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    lastLogin: user.lastLogin,
    createdAt: user.createdAt,
  };
}
