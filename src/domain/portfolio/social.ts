import type { Persisted } from '../audit.js';
import { requireInteger, requireText } from '../validation.js';

export interface SocialData {
  readonly profileId: number;
  readonly platform: string;
  readonly url: string;
  readonly iconName: string | null;
  /** Display position, ascending. */
  readonly order: number;
}

export type Social = Persisted<SocialData>;

export function buildSocial(input: SocialData): SocialData {
  return {
    profileId: input.profileId,
    platform: requireText(input.platform, 'platform'),
    url: requireText(input.url, 'url'),
    iconName: input.iconName,
    order: requireInteger(input.order, 'order'),
  };
}
