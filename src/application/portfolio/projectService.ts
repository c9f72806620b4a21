import { mergeDefined } from '../../domain/audit.js';
import type {
  ProjectPreviewRepository,
  ProjectRepository,
  ProjectTechRepository,
  TechnologyRepository,
  WorkExperienceRepository,
} from '../../domain/portfolio/ports.js';
import {
  buildProject,
  buildProjectPreview,
  type Project,
  type ProjectCategory,
  type ProjectData,
  type ProjectPreview,
  type ProjectPreviewInput,
} from '../../domain/portfolio/project.js';
import {
  ProjectNotFoundError,
  TechnologyNotFoundError,
  WorkExperienceNotFoundError,
} from '../errors.js';
import type { Profile } from '../../domain/portfolio/profile.js';
import type { ProfileScope } from './profileScope.js';
import { ProfileScopedService } from './profileScopedService.js';

export interface ProjectPreviewCommand {
  imageUrl: string;
  caption?: string | null;
  order?: number;
}

export interface CreateProjectCommand {
  title: string;
  category: ProjectCategory;
  description?: string | null;
  thumbnailUrl?: string | null;
  liveUrl?: string | null;
  repoUrl?: string | null;
  featured?: boolean;
  workExperienceId?: number | null;
  technologyIds?: number[];
  previews?: ProjectPreviewCommand[];
}

/**
 * `technologyIds` and `previews`, when present, replace the whole
 * collection. Leaving them out keeps the current associations.
 */
export interface UpdateProjectCommand extends Partial<Omit<ProjectData, 'profileId'>> {
  technologyIds?: number[];
  previews?: ProjectPreviewCommand[];
}

export interface ProjectDetails extends Project {
  technologyIds: number[];
  previews: ProjectPreview[];
}

export async function loadProjectDetails(
  project: Project,
  projectTechs: ProjectTechRepository,
  projectPreviews: ProjectPreviewRepository
): Promise<ProjectDetails> {
  const [technologyIds, previews] = await Promise.all([
    projectTechs.findTechnologyIds(project.id),
    projectPreviews.findByProjectId(project.id),
  ]);
  return { ...project, technologyIds, previews };
}

function toPreviewInputs(previews: ProjectPreviewCommand[]): ProjectPreviewInput[] {
  return previews.map((preview) =>
    buildProjectPreview({
      imageUrl: preview.imageUrl,
      caption: preview.caption ?? null,
      order: preview.order ?? 0,
    })
  );
}

export interface ProjectServiceDependencies {
  projects: ProjectRepository;
  projectTechs: ProjectTechRepository;
  projectPreviews: ProjectPreviewRepository;
  workExperiences: WorkExperienceRepository;
  technologies: TechnologyRepository;
}

export class ProjectService extends ProfileScopedService<ProjectData> {
  private readonly projects: ProjectRepository;
  private readonly projectTechs: ProjectTechRepository;
  private readonly projectPreviews: ProjectPreviewRepository;
  private readonly workExperiences: WorkExperienceRepository;
  private readonly technologies: TechnologyRepository;

  constructor(deps: ProjectServiceDependencies, scope: ProfileScope) {
    super(deps.projects, scope, {
      notFound: () => new ProjectNotFoundError(),
      deniedMessage: 'You do not have access to this project',
    });
    this.projects = deps.projects;
    this.projectTechs = deps.projectTechs;
    this.projectPreviews = deps.projectPreviews;
    this.workExperiences = deps.workExperiences;
    this.technologies = deps.technologies;
  }

  async createProject(userId: number, command: CreateProjectCommand): Promise<ProjectDetails> {
    const profile = await this.scope.requireProfile(userId);
    const workExperienceId = command.workExperienceId ?? null;
    await this.verifyWorkExperienceOwnership(profile, workExperienceId);
    const technologyIds = await this.verifyTechnologyOwnership(profile, command.technologyIds);
    const previews = command.previews ? toPreviewInputs(command.previews) : undefined;

    const project = await this.createOwned(userId, (profileId) =>
      buildProject({
        profileId,
        title: command.title,
        category: command.category,
        description: command.description ?? null,
        thumbnailUrl: command.thumbnailUrl ?? null,
        liveUrl: command.liveUrl ?? null,
        repoUrl: command.repoUrl ?? null,
        featured: command.featured ?? false,
        workExperienceId,
      })
    );

    await this.replaceChildren(project.id, userId, technologyIds, previews);
    return this.withDetails(project);
  }

  async getAllMyProjects(userId: number): Promise<ProjectDetails[]> {
    const projects = await this.listOwned(userId);
    return Promise.all(projects.map((project) => this.withDetails(project)));
  }

  async getFeaturedMyProjects(userId: number): Promise<ProjectDetails[]> {
    const profile = await this.scope.requireProfile(userId);
    const projects = await this.projects.findFeaturedByProfileId(profile.id);
    return Promise.all(projects.map((project) => this.withDetails(project)));
  }

  async getProjectById(userId: number, id: number): Promise<ProjectDetails> {
    return this.withDetails(await this.findOwned(userId, id));
  }

  /**
   * The project row and its two child collections are written in separate
   * steps; a failure part-way leaves the earlier steps applied.
   */
  async updateProject(
    userId: number,
    id: number,
    command: UpdateProjectCommand
  ): Promise<ProjectDetails> {
    const { technologyIds: requestedTechIds, previews: requestedPreviews, ...fields } = command;

    const profile = await this.scope.requireProfile(userId);
    const existing = await this.findOwnedBy(profile, id);
    if (fields.workExperienceId !== undefined) {
      await this.verifyWorkExperienceOwnership(profile, fields.workExperienceId);
    }
    const technologyIds = await this.verifyTechnologyOwnership(profile, requestedTechIds);
    const previews = requestedPreviews ? toPreviewInputs(requestedPreviews) : undefined;
    const next = buildProject(mergeDefined<ProjectData>(existing, fields));

    const project = await this.persistUpdate(userId, existing, next);
    await this.replaceChildren(project.id, userId, technologyIds, previews);
    return this.withDetails(project);
  }

  async deleteProject(userId: number, id: number): Promise<boolean> {
    return this.deleteOwned(userId, id);
  }

  private async withDetails(project: Project): Promise<ProjectDetails> {
    return loadProjectDetails(project, this.projectTechs, this.projectPreviews);
  }

  private async replaceChildren(
    projectId: number,
    userId: number,
    technologyIds: number[] | undefined,
    previews: ProjectPreviewInput[] | undefined
  ): Promise<void> {
    if (technologyIds !== undefined) {
      await this.projectTechs.replaceForProject(projectId, technologyIds, userId);
    }
    if (previews !== undefined) {
      await this.projectPreviews.replaceForProject(projectId, previews, userId);
    }
  }

  private async verifyWorkExperienceOwnership(
    profile: Profile,
    workExperienceId: number | null
  ): Promise<void> {
    if (workExperienceId === null) {
      return;
    }
    const workExperience = await this.workExperiences.findById(workExperienceId);
    if (!workExperience) {
      throw new WorkExperienceNotFoundError();
    }
    this.scope.assertOwns(
      profile,
      workExperience,
      'You cannot link a work experience you do not own'
    );
  }

  /**
   * Returns the de-duplicated id list, or undefined when no list was given.
   */
  private async verifyTechnologyOwnership(
    profile: Profile,
    technologyIds: number[] | undefined
  ): Promise<number[] | undefined> {
    if (technologyIds === undefined) {
      return undefined;
    }
    const unique = [...new Set(technologyIds)];
    if (unique.length === 0) {
      return unique;
    }

    for (const techId of unique) {
      const technology = await this.technologies.findById(techId);
      if (!technology) {
        throw new TechnologyNotFoundError(`Technology ${techId} not found`);
      }
      this.scope.assertOwns(profile, technology, 'You cannot link a technology you do not own');
    }
    return unique;
  }
}
