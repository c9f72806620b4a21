import type { Persisted } from '../../domain/audit.js';
import type { ProfileScopedRepository } from '../../domain/portfolio/ports.js';
import type { Profile } from '../../domain/portfolio/profile.js';
import type { NotFoundError } from '../errors.js';
import type { ProfileOwned, ProfileScope } from './profileScope.js';

export interface ScopedResource {
  notFound: () => NotFoundError;
  /** Message for UnauthorizedAccessError when the caller does not own it. */
  deniedMessage: string;
}

/**
 * Create / read / update / soft-delete for a resource owned by a profile.
 * Ownership is checked against the stored row on every access by id.
 */
export abstract class ProfileScopedService<TData extends ProfileOwned> {
  protected constructor(
    protected readonly repository: ProfileScopedRepository<TData>,
    protected readonly scope: ProfileScope,
    private readonly resource: ScopedResource
  ) {}

  /**
   * `build` receives the caller's profile id and must return validated data;
   * it runs before anything is written.
   */
  protected async createOwned(
    userId: number,
    build: (profileId: number) => TData
  ): Promise<Persisted<TData>> {
    const profile = await this.scope.requireProfile(userId);
    const data = build(profile.id);
    return this.repository.save({ ...data, createdBy: userId });
  }

  protected async listOwned(userId: number): Promise<Persisted<TData>[]> {
    const profile = await this.scope.requireProfile(userId);
    return this.repository.findAllByProfileId(profile.id);
  }

  /**
   * The caller's profile is resolved before the row is looked up, so a user
   * without a profile gets ProfileRequiredError whatever the id.
   */
  protected async findOwned(userId: number, id: number): Promise<Persisted<TData>> {
    await this.scope.requireProfile(userId);
    const existing = await this.findExisting(id);
    await this.scope.verifyOwnership(userId, existing, this.resource.deniedMessage);
    return existing;
  }

  /** Same checks as findOwned, against an already resolved profile. */
  protected async findOwnedBy(profile: Profile, id: number): Promise<Persisted<TData>> {
    const existing = await this.findExisting(id);
    this.scope.assertOwns(profile, existing, this.resource.deniedMessage);
    return existing;
  }

  private async findExisting(id: number): Promise<Persisted<TData>> {
    const existing = await this.repository.findById(id);
    if (!existing) {
      throw this.resource.notFound();
    }
    return existing;
  }

  /**
   * `apply` merges the caller's patch into the stored record and validates
   * the result. Audit stamps are set here.
   */
  protected async updateOwned(
    userId: number,
    id: number,
    apply: (existing: Persisted<TData>) => TData
  ): Promise<Persisted<TData>> {
    const existing = await this.findOwned(userId, id);
    return this.persistUpdate(userId, existing, apply(existing));
  }

  protected async persistUpdate(
    userId: number,
    existing: Persisted<TData>,
    next: TData
  ): Promise<Persisted<TData>> {
    return this.repository.update({
      ...existing,
      ...next,
      profileId: existing.profileId,
      updatedAt: new Date(),
      updatedBy: userId,
    });
  }

  protected async deleteOwned(userId: number, id: number): Promise<boolean> {
    await this.findOwned(userId, id);
    return this.repository.delete(id, userId);
  }
}
