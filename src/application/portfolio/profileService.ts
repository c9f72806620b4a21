import { mergeDefined } from '../../domain/audit.js';
import type { ProfileRepository } from '../../domain/portfolio/ports.js';
import { buildProfile, type Profile, type ProfileData } from '../../domain/portfolio/profile.js';
import { ProfileAlreadyExistsError, ProfileNotFoundError } from '../errors.js';

export interface CreateProfileCommand {
  name: string;
  lastName: string;
  email: string;
  currentTitle?: string | null;
  bioSummary?: string | null;
  phone?: string | null;
  location?: string | null;
  photoUrl?: string | null;
}

export type UpdateProfileCommand = Partial<Omit<ProfileData, 'userId'>>;

/**
 * A user owns at most one profile; every method works on the caller's own.
 */
export class ProfileService {
  constructor(private readonly profiles: ProfileRepository) {}

  async createProfile(userId: number, command: CreateProfileCommand): Promise<Profile> {
    const existing = await this.profiles.findByUserId(userId);
    if (existing) {
      throw new ProfileAlreadyExistsError();
    }

    const data = buildProfile({
      userId,
      name: command.name,
      lastName: command.lastName,
      email: command.email,
      currentTitle: command.currentTitle ?? null,
      bioSummary: command.bioSummary ?? null,
      phone: command.phone ?? null,
      location: command.location ?? null,
      photoUrl: command.photoUrl ?? null,
    });

    return this.profiles.save({ ...data, createdBy: userId });
  }

  async getMyProfile(userId: number): Promise<Profile> {
    const profile = await this.profiles.findByUserId(userId);
    if (!profile) {
      throw new ProfileNotFoundError();
    }
    return profile;
  }

  async updateMyProfile(userId: number, command: UpdateProfileCommand): Promise<Profile> {
    const existing = await this.getMyProfile(userId);
    const next = buildProfile(mergeDefined<ProfileData>(existing, command));

    return this.profiles.update({
      ...existing,
      ...next,
      userId: existing.userId,
      updatedAt: new Date(),
      updatedBy: userId,
    });
  }
}
