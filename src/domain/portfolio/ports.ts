import type { NewRecord, Persisted } from '../audit.js';
import type { ClientData } from './client.js';
import type { Profile, ProfileData } from './profile.js';
import type {
  Project,
  ProjectData,
  ProjectPreview,
  ProjectPreviewInput,
} from './project.js';
import type { SocialData } from './social.js';
import type { TechnologyData } from './technology.js';
import type { WorkExperienceData } from './workExperience.js';

/**
 * Every read filters out soft-deleted rows.
 */
export interface ProfileRepository {
  findById(id: number): Promise<Profile | null>;
  findByUserId(userId: number): Promise<Profile | null>;
  save(profile: NewRecord<ProfileData>): Promise<Profile>;
  update(profile: Profile): Promise<Profile>;
}

/**
 * Storage contract shared by every resource that hangs off a profile.
 */
export interface ProfileScopedRepository<TData extends { readonly profileId: number }> {
  findById(id: number): Promise<Persisted<TData> | null>;
  findAllByProfileId(profileId: number): Promise<Persisted<TData>[]>;
  save(record: NewRecord<TData>): Promise<Persisted<TData>>;
  update(record: Persisted<TData>): Promise<Persisted<TData>>;
  /** Soft delete. Returns false when no active row had that id. */
  delete(id: number, deletedBy: number): Promise<boolean>;
}

export type WorkExperienceRepository = ProfileScopedRepository<WorkExperienceData>;
export type TechnologyRepository = ProfileScopedRepository<TechnologyData>;
export type ClientRepository = ProfileScopedRepository<ClientData>;
export type SocialRepository = ProfileScopedRepository<SocialData>;

export interface ProjectRepository extends ProfileScopedRepository<ProjectData> {
  findFeaturedByProfileId(profileId: number): Promise<Project[]>;
}

export interface ProjectTechRepository {
  findTechnologyIds(projectId: number): Promise<number[]>;
  /**
   * Deactivate every link of the project, then link exactly `techIds`.
   */
  replaceForProject(projectId: number, techIds: readonly number[], actorId: number): Promise<void>;
}

export interface ProjectPreviewRepository {
  findByProjectId(projectId: number): Promise<ProjectPreview[]>;
  /**
   * Deactivate every preview of the project, then store `previews`.
   */
  replaceForProject(
    projectId: number,
    previews: readonly ProjectPreviewInput[],
    actorId: number
  ): Promise<ProjectPreview[]>;
}
