import { mergeDefined } from '../../domain/audit.js';
import { buildClient, type Client, type ClientData } from '../../domain/portfolio/client.js';
import type { ClientRepository } from '../../domain/portfolio/ports.js';
import { ClientNotFoundError } from '../errors.js';
import type { ProfileScope } from './profileScope.js';
import { ProfileScopedService } from './profileScopedService.js';

export interface CreateClientCommand {
  name: string;
  company?: string | null;
  feedback?: string | null;
  clientPhotoUrl?: string | null;
  projectLink?: string | null;
}

export type UpdateClientCommand = Partial<Omit<ClientData, 'profileId'>>;

export class ClientService extends ProfileScopedService<ClientData> {
  constructor(repository: ClientRepository, scope: ProfileScope) {
    super(repository, scope, {
      notFound: () => new ClientNotFoundError(),
      deniedMessage: 'You do not have access to this client',
    });
  }

  async createClient(userId: number, command: CreateClientCommand): Promise<Client> {
    return this.createOwned(userId, (profileId) =>
      buildClient({
        profileId,
        name: command.name,
        company: command.company ?? null,
        feedback: command.feedback ?? null,
        clientPhotoUrl: command.clientPhotoUrl ?? null,
        projectLink: command.projectLink ?? null,
      })
    );
  }

  async getAllMyClients(userId: number): Promise<Client[]> {
    return this.listOwned(userId);
  }

  async getClientById(userId: number, id: number): Promise<Client> {
    return this.findOwned(userId, id);
  }

  async updateClient(userId: number, id: number, command: UpdateClientCommand): Promise<Client> {
    return this.updateOwned(userId, id, (existing) =>
      buildClient(mergeDefined<ClientData>(existing, command))
    );
  }

  async deleteClient(userId: number, id: number): Promise<boolean> {
    return this.deleteOwned(userId, id);
  }
}
