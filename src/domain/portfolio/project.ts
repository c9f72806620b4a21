import type { AuditFields, Persisted } from '../audit.js';
import { requireInteger, requireOneOf, requireText } from '../validation.js';

export const PROJECT_CATEGORIES = ['fullstack', 'backend', 'frontend'] as const;
export type ProjectCategory = (typeof PROJECT_CATEGORIES)[number];

export interface ProjectData {
  readonly profileId: number;
  readonly title: string;
  readonly category: ProjectCategory;
  readonly description: string | null;
  readonly thumbnailUrl: string | null;
  readonly liveUrl: string | null;
  readonly repoUrl: string | null;
  readonly featured: boolean;
  readonly workExperienceId: number | null;
}

export type Project = Persisted<ProjectData>;

export function buildProject(input: ProjectData): ProjectData {
  return {
    profileId: input.profileId,
    title: requireText(input.title, 'title'),
    category: requireOneOf(input.category, PROJECT_CATEGORIES, 'category'),
    description: input.description,
    thumbnailUrl: input.thumbnailUrl,
    liveUrl: input.liveUrl,
    repoUrl: input.repoUrl,
    featured: input.featured,
    workExperienceId: input.workExperienceId,
  };
}

/**
 * Join row between a project and a technology. Keyed by the pair, so it
 * has no id of its own.
 */
export interface ProjectTech extends AuditFields {
  readonly projectId: number;
  readonly techId: number;
}

/** Preview image fields as supplied by the caller. */
export interface ProjectPreviewInput {
  readonly imageUrl: string;
  readonly caption: string | null;
  readonly order: number;
}

export interface ProjectPreviewData extends ProjectPreviewInput {
  readonly projectId: number;
}

export type ProjectPreview = Persisted<ProjectPreviewData>;

export function buildProjectPreview(input: ProjectPreviewInput): ProjectPreviewInput {
  return {
    imageUrl: requireText(input.imageUrl, 'imageUrl'),
    caption: input.caption,
    order: requireInteger(input.order, 'order'),
  };
}
