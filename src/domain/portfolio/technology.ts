import type { Persisted } from '../audit.js';
import { requireOneOf, requireText } from '../validation.js';

export const TECHNOLOGY_CATEGORIES = [
  'frontend',
  'backend',
  'databases',
  'apis',
  'dev_tools',
  'cloud',
  'testing',
  'architecture',
  'security',
] as const;
export type TechnologyCategory = (typeof TECHNOLOGY_CATEGORIES)[number];

export interface TechnologyData {
  readonly profileId: number;
  readonly name: string;
  readonly category: TechnologyCategory;
  readonly iconUrl: string | null;
}

export type Technology = Persisted<TechnologyData>;

export function buildTechnology(input: TechnologyData): TechnologyData {
  return {
    profileId: input.profileId,
    name: requireText(input.name, 'name'),
    category: requireOneOf(input.category, TECHNOLOGY_CATEGORIES, 'category'),
    iconUrl: input.iconUrl,
  };
}
