import type { UserRepository } from '../../domain/auth/ports.js';
import type { Client } from '../../domain/portfolio/client.js';
import type {
  ClientRepository,
  ProfileRepository,
  ProjectPreviewRepository,
  ProjectRepository,
  ProjectTechRepository,
  SocialRepository,
  TechnologyRepository,
  WorkExperienceRepository,
} from '../../domain/portfolio/ports.js';
import type { Profile } from '../../domain/portfolio/profile.js';
import type { Project } from '../../domain/portfolio/project.js';
import type { Social } from '../../domain/portfolio/social.js';
import type { Technology } from '../../domain/portfolio/technology.js';
import type { WorkExperience } from '../../domain/portfolio/workExperience.js';
import { ProfileNotFoundError, ProjectNotFoundError, UserNotFoundError } from '../errors.js';
import { loadProjectDetails, type ProjectDetails } from './projectService.js';

export interface PublicPortfolioRepositories {
  users: UserRepository;
  profiles: ProfileRepository;
  workExperiences: WorkExperienceRepository;
  projects: ProjectRepository;
  projectTechs: ProjectTechRepository;
  projectPreviews: ProjectPreviewRepository;
  technologies: TechnologyRepository;
  clients: ClientRepository;
  socials: SocialRepository;
}

/**
 * Read-only view of a user's portfolio, addressed by username. Needs no
 * authentication.
 */
export class PublicPortfolioQueries {
  constructor(private readonly repos: PublicPortfolioRepositories) {}

  async getProfile(username: string): Promise<Profile> {
    const user = await this.repos.users.findByUsername(username);
    if (!user) {
      throw new UserNotFoundError();
    }
    const profile = await this.repos.profiles.findByUserId(user.id);
    if (!profile) {
      throw new ProfileNotFoundError();
    }
    return profile;
  }

  async listProjects(username: string): Promise<ProjectDetails[]> {
    const profile = await this.getProfile(username);
    const projects = await this.repos.projects.findAllByProfileId(profile.id);
    return Promise.all(projects.map((project) => this.details(project)));
  }

  async listFeaturedProjects(username: string): Promise<ProjectDetails[]> {
    const profile = await this.getProfile(username);
    const projects = await this.repos.projects.findFeaturedByProfileId(profile.id);
    return Promise.all(projects.map((project) => this.details(project)));
  }

  /**
   * A project of another user is reported as missing, not forbidden.
   */
  async getProject(username: string, projectId: number): Promise<ProjectDetails> {
    const profile = await this.getProfile(username);
    const project = await this.repos.projects.findById(projectId);
    if (!project || project.profileId !== profile.id) {
      throw new ProjectNotFoundError();
    }
    return this.details(project);
  }

  async listWorkExperiences(username: string): Promise<WorkExperience[]> {
    const profile = await this.getProfile(username);
    return this.repos.workExperiences.findAllByProfileId(profile.id);
  }

  async listTechnologies(username: string): Promise<Technology[]> {
    const profile = await this.getProfile(username);
    return this.repos.technologies.findAllByProfileId(profile.id);
  }

  async listClients(username: string): Promise<Client[]> {
    const profile = await this.getProfile(username);
    return this.repos.clients.findAllByProfileId(profile.id);
  }

  async listSocials(username: string): Promise<Social[]> {
    const profile = await this.getProfile(username);
    return this.repos.socials.findAllByProfileId(profile.id);
  }

  private details(project: Project): Promise<ProjectDetails> {
    return loadProjectDetails(project, this.repos.projectTechs, this.repos.projectPreviews);
  }
}
