import { mergeDefined } from '../../domain/audit.js';
import type { TechnologyRepository } from '../../domain/portfolio/ports.js';
import {
  buildTechnology,
  type Technology,
  type TechnologyCategory,
  type TechnologyData,
} from '../../domain/portfolio/technology.js';
import { TechnologyNotFoundError } from '../errors.js';
import type { ProfileScope } from './profileScope.js';
import { ProfileScopedService } from './profileScopedService.js';

export interface CreateTechnologyCommand {
  name: string;
  category: TechnologyCategory;
  iconUrl?: string | null;
}

export type UpdateTechnologyCommand = Partial<Omit<TechnologyData, 'profileId'>>;

export class TechnologyService extends ProfileScopedService<TechnologyData> {
  constructor(repository: TechnologyRepository, scope: ProfileScope) {
    super(repository, scope, {
      notFound: () => new TechnologyNotFoundError(),
      deniedMessage: 'You do not have access to this technology',
    });
  }

  async createTechnology(userId: number, command: CreateTechnologyCommand): Promise<Technology> {
    return this.createOwned(userId, (profileId) =>
      buildTechnology({
        profileId,
        name: command.name,
        category: command.category,
        iconUrl: command.iconUrl ?? null,
      })
    );
  }

  async getAllMyTechnologies(userId: number): Promise<Technology[]> {
    return this.listOwned(userId);
  }

  async getTechnologyById(userId: number, id: number): Promise<Technology> {
    return this.findOwned(userId, id);
  }

  async updateTechnology(
    userId: number,
    id: number,
    command: UpdateTechnologyCommand
  ): Promise<Technology> {
    return this.updateOwned(userId, id, (existing) =>
      buildTechnology(mergeDefined<TechnologyData>(existing, command))
    );
  }

  async deleteTechnology(userId: number, id: number): Promise<boolean> {
    return this.deleteOwned(userId, id);
  }
}
