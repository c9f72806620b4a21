import { mergeDefined } from '../../domain/audit.js';
import type { WorkExperienceRepository } from '../../domain/portfolio/ports.js';
import {
  buildWorkExperience,
  type WorkExperience,
  type WorkExperienceData,
} from '../../domain/portfolio/workExperience.js';
import { WorkExperienceNotFoundError } from '../errors.js';
import type { ProfileScope } from './profileScope.js';
import { ProfileScopedService } from './profileScopedService.js';

export interface CreateWorkExperienceCommand {
  jobTitle: string;
  company: string;
  startDate: string;
  location?: string | null;
  endDate?: string | null;
  description?: string | null;
}

export type UpdateWorkExperienceCommand = Partial<Omit<WorkExperienceData, 'profileId'>>;

export class WorkExperienceService extends ProfileScopedService<WorkExperienceData> {
  constructor(repository: WorkExperienceRepository, scope: ProfileScope) {
    super(repository, scope, {
      notFound: () => new WorkExperienceNotFoundError(),
      deniedMessage: 'You do not have access to this work experience',
    });
  }

  async createWorkExperience(
    userId: number,
    command: CreateWorkExperienceCommand
  ): Promise<WorkExperience> {
    return this.createOwned(userId, (profileId) =>
      buildWorkExperience({
        profileId,
        jobTitle: command.jobTitle,
        company: command.company,
        location: command.location ?? null,
        startDate: command.startDate,
        endDate: command.endDate ?? null,
        description: command.description ?? null,
      })
    );
  }

  async getAllMyWorkExperiences(userId: number): Promise<WorkExperience[]> {
    return this.listOwned(userId);
  }

  async getWorkExperienceById(userId: number, id: number): Promise<WorkExperience> {
    return this.findOwned(userId, id);
  }

  async updateWorkExperience(
    userId: number,
    id: number,
    command: UpdateWorkExperienceCommand
  ): Promise<WorkExperience> {
    return this.updateOwned(userId, id, (existing) =>
      buildWorkExperience(mergeDefined<WorkExperienceData>(existing, command))
    );
  }

  async deleteWorkExperience(userId: number, id: number): Promise<boolean> {
    return this.deleteOwned(userId, id);
  }
}
