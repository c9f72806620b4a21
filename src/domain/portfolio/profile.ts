import type { Persisted } from '../audit.js';
import { ValidationError } from '../errors.js';
import { maxLength } from '../validation.js';

export const BIO_SUMMARY_MAX_LENGTH = 500;

export interface ProfileData {
  readonly userId: number;
  readonly name: string;
  readonly lastName: string;
  readonly email: string;
  readonly currentTitle: string | null;
  readonly bioSummary: string | null;
  readonly phone: string | null;
  readonly location: string | null;
  readonly photoUrl: string | null;
}

export type Profile = Persisted<ProfileData>;

/**
 * Collapse inner whitespace and capitalise each word: "  juan   carlos " →
 * "Juan Carlos", "o'BRIEN" → "O'Brien".
 */
export function normalizePersonName(value: string): string {
  return value
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ')
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) =>
      boundary + letter.toUpperCase()
    );
}

export function buildProfile(input: ProfileData): ProfileData {
  const name = normalizePersonName(input.name);
  const lastName = normalizePersonName(input.lastName);
  if (name.length === 0 || lastName.length === 0) {
    throw new ValidationError('Name and last name are required', name ? 'lastName' : 'name');
  }

  return {
    userId: input.userId,
    name,
    lastName,
    email: input.email.trim().toLowerCase(),
    currentTitle: input.currentTitle,
    bioSummary: maxLength(input.bioSummary, BIO_SUMMARY_MAX_LENGTH, 'bioSummary'),
    phone: input.phone,
    location: input.location,
    photoUrl: input.photoUrl,
  };
}

export function fullName(profile: Pick<ProfileData, 'name' | 'lastName'>): string {
  return `${profile.name} ${profile.lastName}`;
}
