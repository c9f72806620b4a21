import type { PasswordHasher, TokenManager, UserRepository } from '../domain/auth/ports.js';
import type {
  ClientRepository,
  ProfileRepository,
  ProjectPreviewRepository,
  ProjectRepository,
  ProjectTechRepository,
  SocialRepository,
  TechnologyRepository,
  WorkExperienceRepository,
} from '../domain/portfolio/ports.js';
import { AuthenticateUseCase } from './auth/authenticate.js';
import { LoginUseCase } from './auth/login.js';
import { RegisterUseCase } from './auth/register.js';
import { type ImageStorage, UploadImageUseCase } from './images/uploadImage.js';
import { ClientService } from './portfolio/clientService.js';
import { ProfileScope } from './portfolio/profileScope.js';
import { ProfileService } from './portfolio/profileService.js';
import { ProjectService } from './portfolio/projectService.js';
import { PublicPortfolioQueries } from './portfolio/publicPortfolio.js';
import { SocialService } from './portfolio/socialService.js';
import { TechnologyService } from './portfolio/technologyService.js';
import { WorkExperienceService } from './portfolio/workExperienceService.js';

export interface Repositories {
  users: UserRepository;
  profiles: ProfileRepository;
  workExperiences: WorkExperienceRepository;
  projects: ProjectRepository;
  projectTechs: ProjectTechRepository;
  projectPreviews: ProjectPreviewRepository;
  technologies: TechnologyRepository;
  clients: ClientRepository;
  socials: SocialRepository;
}

export interface SecurityPorts {
  hasher: PasswordHasher;
  tokens: TokenManager;
}

export interface ServiceOptions {
  superadminEmail?: string;
  /** Image upload is only offered when storage is configured. */
  imageStorage?: ImageStorage;
}

export interface AppServices {
  register: RegisterUseCase;
  login: LoginUseCase;
  authenticate: AuthenticateUseCase;
  profiles: ProfileService;
  workExperiences: WorkExperienceService;
  projects: ProjectService;
  technologies: TechnologyService;
  clients: ClientService;
  socials: SocialService;
  publicPortfolio: PublicPortfolioQueries;
  uploadImage: UploadImageUseCase | null;
}

export function buildServices(
  repos: Repositories,
  security: SecurityPorts,
  options: ServiceOptions = {}
): AppServices {
  const scope = new ProfileScope(repos.profiles);

  return {
    register: new RegisterUseCase(repos.users, security.hasher, {
      superadminEmail: options.superadminEmail,
    }),
    login: new LoginUseCase(repos.users, security.hasher, security.tokens),
    authenticate: new AuthenticateUseCase(repos.users, security.tokens),
    profiles: new ProfileService(repos.profiles),
    workExperiences: new WorkExperienceService(repos.workExperiences, scope),
    projects: new ProjectService(
      {
        projects: repos.projects,
        projectTechs: repos.projectTechs,
        projectPreviews: repos.projectPreviews,
        workExperiences: repos.workExperiences,
        technologies: repos.technologies,
      },
      scope
    ),
    technologies: new TechnologyService(repos.technologies, scope),
    clients: new ClientService(repos.clients, scope),
    socials: new SocialService(repos.socials, scope),
    publicPortfolio: new PublicPortfolioQueries(repos),
    uploadImage: options.imageStorage ? new UploadImageUseCase(options.imageStorage) : null,
  };
}
