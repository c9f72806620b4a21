import type { Repositories } from '../../application/services.js';
import { ClientRepo } from './clientRepo.js';
import type { Db } from './pool.js';
import { ProfileRepo } from './profileRepo.js';
import { ProjectPreviewRepo } from './projectPreviewRepo.js';
import { ProjectRepo } from './projectRepo.js';
import { ProjectTechRepo } from './projectTechRepo.js';
import { SocialRepo } from './socialRepo.js';
import { TechnologyRepo } from './technologyRepo.js';
import { UserRepo } from './userRepo.js';
import { WorkExperienceRepo } from './workExperienceRepo.js';

export function createPgRepositories(db: Db): Repositories {
  return {
    users: new UserRepo(db),
    profiles: new ProfileRepo(db),
    workExperiences: new WorkExperienceRepo(db),
    projects: new ProjectRepo(db),
    projectTechs: new ProjectTechRepo(db),
    projectPreviews: new ProjectPreviewRepo(db),
    technologies: new TechnologyRepo(db),
    clients: new ClientRepo(db),
    socials: new SocialRepo(db),
  };
}
