import type { Persisted } from '../audit.js';
import { requireText } from '../validation.js';

export interface ClientData {
  readonly profileId: number;
  readonly name: string;
  readonly company: string | null;
  readonly feedback: string | null;
  readonly clientPhotoUrl: string | null;
  readonly projectLink: string | null;
}

export type Client = Persisted<ClientData>;

export function buildClient(input: ClientData): ClientData {
  return {
    profileId: input.profileId,
    name: requireText(input.name, 'name'),
    company: input.company,
    feedback: input.feedback,
    clientPhotoUrl: input.clientPhotoUrl,
    projectLink: input.projectLink,
  };
}
