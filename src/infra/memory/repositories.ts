import type { Repositories } from '../../application/services.js';
import type { UserRepository } from '../../domain/auth/ports.js';
import type { NewUser, User } from '../../domain/auth/user.js';
import type { NewRecord } from '../../domain/audit.js';
import type { ClientData } from '../../domain/portfolio/client.js';
import type {
  ProfileRepository,
  ProjectPreviewRepository,
  ProjectRepository,
  ProjectTechRepository,
  TechnologyRepository,
} from '../../domain/portfolio/ports.js';
import type { Profile, ProfileData } from '../../domain/portfolio/profile.js';
import type {
  Project,
  ProjectData,
  ProjectPreview,
  ProjectPreviewInput,
  ProjectTech,
} from '../../domain/portfolio/project.js';
import type { SocialData } from '../../domain/portfolio/social.js';
import type { TechnologyData } from '../../domain/portfolio/technology.js';
import type { WorkExperience, WorkExperienceData } from '../../domain/portfolio/workExperience.js';
import { InMemoryProfileScopedRepo } from './profileScopedRepo.js';

// Orderings mirror the ORDER BY clauses of the PostgreSQL repositories

const byStartDateDesc = (a: WorkExperience, b: WorkExperience): number =>
  b.startDate.localeCompare(a.startDate) || b.id - a.id;

const byFeaturedThenNewest = (a: Project, b: Project): number =>
  Number(b.featured) - Number(a.featured) || b.id - a.id;

const byName = (a: { name: string; id: number }, b: { name: string; id: number }): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : a.id - b.id;

const byOrder = (a: { order: number; id: number }, b: { order: number; id: number }): number =>
  a.order - b.order || a.id - b.id;

export class InMemoryUserRepo implements UserRepository {
  private readonly users = new Map<number, User>();
  private nextId = 1;

  async findById(id: number): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return [...this.users.values()].find((user) => user.email === email) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return [...this.users.values()].find((user) => user.username === username) ?? null;
  }

  async save(user: NewUser): Promise<User> {
    const stored: User = { ...user, id: this.nextId++, lastLogin: null, createdAt: new Date() };
    this.users.set(stored.id, stored);
    return stored;
  }

  async update(user: User): Promise<User> {
    if (!this.users.has(user.id)) {
      throw new Error(`User ${user.id} does not exist`);
    }
    this.users.set(user.id, user);
    return user;
  }
}

export class InMemoryProfileRepo implements ProfileRepository {
  private readonly profiles = new Map<number, Profile>();
  private nextId = 1;

  async findById(id: number): Promise<Profile | null> {
    const profile = this.profiles.get(id);
    return profile && profile.isActive ? profile : null;
  }

  async findByUserId(userId: number): Promise<Profile | null> {
    return (
      [...this.profiles.values()].find((profile) => profile.isActive && profile.userId === userId) ??
      null
    );
  }

  async save(profile: NewRecord<ProfileData>): Promise<Profile> {
    const stored: Profile = {
      ...profile,
      id: this.nextId++,
      createdAt: new Date(),
      updatedAt: null,
      updatedBy: null,
      isActive: true,
    };
    this.profiles.set(stored.id, stored);
    return stored;
  }

  async update(profile: Profile): Promise<Profile> {
    if (!(await this.findById(profile.id))) {
      throw new Error(`Profile ${profile.id} does not exist`);
    }
    this.profiles.set(profile.id, profile);
    return profile;
  }
}

export class InMemoryProjectRepo
  extends InMemoryProfileScopedRepo<ProjectData>
  implements ProjectRepository
{
  constructor() {
    super(byFeaturedThenNewest);
  }

  async findFeaturedByProfileId(profileId: number): Promise<Project[]> {
    return this.active()
      .filter((row) => row.profileId === profileId && row.featured)
      .sort((a, b) => b.id - a.id);
  }
}

export class InMemoryProjectTechRepo implements ProjectTechRepository {
  /** Keyed by `${projectId}:${techId}`. */
  private readonly links = new Map<string, ProjectTech>();

  constructor(private readonly technologies: Pick<TechnologyRepository, 'findById'>) {}

  /** Links to soft-deleted technologies are left out. */
  async findTechnologyIds(projectId: number): Promise<number[]> {
    const linked = [...this.links.values()]
      .filter((link) => link.isActive && link.projectId === projectId)
      .map((link) => link.techId);
    const live: number[] = [];
    for (const techId of linked) {
      if (await this.technologies.findById(techId)) {
        live.push(techId);
      }
    }
    return live.sort((a, b) => a - b);
  }

  async replaceForProject(
    projectId: number,
    techIds: readonly number[],
    actorId: number
  ): Promise<void> {
    const now = new Date();
    for (const [key, link] of this.links) {
      if (link.projectId === projectId && link.isActive) {
        this.links.set(key, { ...link, isActive: false, updatedAt: now, updatedBy: actorId });
      }
    }
    for (const techId of techIds) {
      this.links.set(`${projectId}:${techId}`, {
        projectId,
        techId,
        createdAt: now,
        createdBy: actorId,
        updatedAt: null,
        updatedBy: null,
        isActive: true,
      });
    }
  }

  /** Every stored link, including inactive ones. */
  all(): ProjectTech[] {
    return [...this.links.values()];
  }
}

export class InMemoryProjectPreviewRepo implements ProjectPreviewRepository {
  private readonly previews = new Map<number, ProjectPreview>();
  private nextId = 1;

  async findByProjectId(projectId: number): Promise<ProjectPreview[]> {
    return [...this.previews.values()]
      .filter((preview) => preview.isActive && preview.projectId === projectId)
      .sort(byOrder);
  }

  async replaceForProject(
    projectId: number,
    previews: readonly ProjectPreviewInput[],
    actorId: number
  ): Promise<ProjectPreview[]> {
    const now = new Date();
    for (const [id, preview] of this.previews) {
      if (preview.projectId === projectId && preview.isActive) {
        this.previews.set(id, { ...preview, isActive: false, updatedAt: now, updatedBy: actorId });
      }
    }
    const stored = previews.map((preview) => {
      const row: ProjectPreview = {
        ...preview,
        projectId,
        id: this.nextId++,
        createdAt: now,
        createdBy: actorId,
        updatedAt: null,
        updatedBy: null,
        isActive: true,
      };
      this.previews.set(row.id, row);
      return row;
    });
    return stored.sort(byOrder);
  }
}

export interface InMemoryRepositories extends Repositories {
  users: InMemoryUserRepo;
  profiles: InMemoryProfileRepo;
  projects: InMemoryProjectRepo;
  projectTechs: InMemoryProjectTechRepo;
  projectPreviews: InMemoryProjectPreviewRepo;
}

export function createInMemoryRepositories(): InMemoryRepositories {
  const technologies = new InMemoryProfileScopedRepo<TechnologyData>(byName);
  return {
    users: new InMemoryUserRepo(),
    profiles: new InMemoryProfileRepo(),
    workExperiences: new InMemoryProfileScopedRepo<WorkExperienceData>(byStartDateDesc),
    projects: new InMemoryProjectRepo(),
    projectTechs: new InMemoryProjectTechRepo(technologies),
    projectPreviews: new InMemoryProjectPreviewRepo(),
    technologies,
    clients: new InMemoryProfileScopedRepo<ClientData>(byName),
    socials: new InMemoryProfileScopedRepo<SocialData>(byOrder),
  };
}
