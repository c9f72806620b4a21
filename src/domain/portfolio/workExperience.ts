import type { Persisted } from '../audit.js';
import { ValidationError } from '../errors.js';
import { requireIsoDate, requireText } from '../validation.js';

export interface WorkExperienceData {
  readonly profileId: number;
  readonly jobTitle: string;
  readonly company: string;
  readonly location: string | null;
  /** YYYY-MM-DD */
  readonly startDate: string;
  /** YYYY-MM-DD, null while the position is current */
  readonly endDate: string | null;
  readonly description: string | null;
}

export type WorkExperience = Persisted<WorkExperienceData>;

export function buildWorkExperience(input: WorkExperienceData): WorkExperienceData {
  const startDate = requireIsoDate(input.startDate, 'startDate');
  const endDate = input.endDate === null ? null : requireIsoDate(input.endDate, 'endDate');
  if (endDate !== null && endDate < startDate) {
    throw new ValidationError('End date cannot be before start date', 'endDate');
  }

  return {
    profileId: input.profileId,
    jobTitle: requireText(input.jobTitle, 'jobTitle'),
    company: requireText(input.company, 'company'),
    location: input.location,
    startDate,
    endDate,
    description: input.description,
  };
}
