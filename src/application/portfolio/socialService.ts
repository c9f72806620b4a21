import { mergeDefined } from '../../domain/audit.js';
import type { SocialRepository } from '../../domain/portfolio/ports.js';
import { buildSocial, type Social, type SocialData } from '../../domain/portfolio/social.js';
import { SocialNotFoundError } from '../errors.js';
import type { ProfileScope } from './profileScope.js';
import { ProfileScopedService } from './profileScopedService.js';

export interface CreateSocialCommand {
  platform: string;
  url: string;
  iconName?: string | null;
  order?: number;
}

export type UpdateSocialCommand = Partial<Omit<SocialData, 'profileId'>>;

export class SocialService extends ProfileScopedService<SocialData> {
  constructor(repository: SocialRepository, scope: ProfileScope) {
    super(repository, scope, {
      notFound: () => new SocialNotFoundError(),
      deniedMessage: 'You do not have access to this social link',
    });
  }

  async createSocial(userId: number, command: CreateSocialCommand): Promise<Social> {
    return this.createOwned(userId, (profileId) =>
      buildSocial({
        profileId,
        platform: command.platform,
        url: command.url,
        iconName: command.iconName ?? null,
        order: command.order ?? 0,
      })
    );
  }

  async getAllMySocials(userId: number): Promise<Social[]> {
    return this.listOwned(userId);
  }

  async getSocialById(userId: number, id: number): Promise<Social> {
    return this.findOwned(userId, id);
  }

  async updateSocial(userId: number, id: number, command: UpdateSocialCommand): Promise<Social> {
    return this.updateOwned(userId, id, (existing) =>
      buildSocial(mergeDefined<SocialData>(existing, command))
    );
  }

  async deleteSocial(userId: number, id: number): Promise<boolean> {
    return this.deleteOwned(userId, id);
  }
}
