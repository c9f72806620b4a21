import { ProfileRequiredError } from '../../domain/errors.js';
import type { Profile } from '../../domain/portfolio/profile.js';
import type { ProfileRepository } from '../../domain/portfolio/ports.js';
import { UnauthorizedAccessError } from '../errors.js';

export interface ProfileOwned {
  readonly profileId: number;
}

/**
 * Resolves the caller's own profile and checks stored resources against it.
 * The profile id is always looked up from the authenticated user, never
 * taken from request input.
 */
export class ProfileScope {
  constructor(private readonly profiles: ProfileRepository) {}

  async requireProfile(userId: number): Promise<Profile> {
    const profile = await this.profiles.findByUserId(userId);
    if (!profile) {
      throw new ProfileRequiredError();
    }
    return profile;
  }

  async verifyOwnership(
    userId: number,
    resource: ProfileOwned,
    deniedMessage?: string
  ): Promise<void> {
    this.assertOwns(await this.requireProfile(userId), resource, deniedMessage);
  }

  assertOwns(profile: Profile, resource: ProfileOwned, deniedMessage?: string): void {
    if (resource.profileId !== profile.id) {
      throw new UnauthorizedAccessError(deniedMessage);
    }
  }
}
