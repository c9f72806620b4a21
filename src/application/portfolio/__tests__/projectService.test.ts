import { describe, it, expect, beforeEach } from 'vitest';
import { ProfileRequiredError } from '../../../domain/errors.js';
import {
  ProjectNotFoundError,
  TechnologyNotFoundError,
  UnauthorizedAccessError,
  WorkExperienceNotFoundError,
} from '../../errors.js';
import { createTestContext, seedUserWithProfile, type TestContext } from '../../../test/fakes.js';

describe('ProjectService', () => {
  let ctx: TestContext;
  let alice: { userId: number; profileId: number };
  let bob: { userId: number; profileId: number };

  async function createTechnology(userId: number, name: string): Promise<number> {
    const technology = await ctx.services.technologies.createTechnology(userId, {
      name,
      category: 'backend',
    });
    return technology.id;
  }

  beforeEach(async () => {
    ctx = createTestContext();
    alice = await seedUserWithProfile(ctx.services, 'alice');
    bob = await seedUserWithProfile(ctx.services, 'bob');
  });

  it('should require a profile before checking linked records', async () => {
    const carol = await ctx.services.register.execute({
      username: 'carol',
      email: 'carol@example.com',
      password: 'password123',
    });

    await expect(
      ctx.services.projects.createProject(carol.id, {
        title: 'Storefront',
        category: 'backend',
        workExperienceId: 42,
        technologyIds: [7],
      })
    ).rejects.toThrow(ProfileRequiredError);
    await expect(
      ctx.services.projects.updateProject(carol.id, 999, { workExperienceId: 42 })
    ).rejects.toThrow(ProfileRequiredError);
    await expect(ctx.services.projects.getProjectById(carol.id, 999)).rejects.toThrow(
      ProfileRequiredError
    );
  });

  it('should drop a soft-deleted technology from project reads', async () => {
    const node = await createTechnology(alice.userId, 'Node');
    const go = await createTechnology(alice.userId, 'Go');
    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'backend',
      technologyIds: [node, go],
    });

    await ctx.services.technologies.deleteTechnology(alice.userId, go);

    const mine = await ctx.services.projects.getProjectById(alice.userId, project.id);
    expect(mine.technologyIds).toEqual([node]);
    const shown = await ctx.services.publicPortfolio.getProject('alice', project.id);
    expect(shown.technologyIds).toEqual([node]);
  });

  it('should link a work experience the caller owns', async () => {
    const job = await ctx.services.workExperiences.createWorkExperience(alice.userId, {
      jobTitle: 'Engineer',
      company: 'Acme',
      startDate: '2022-01-01',
      endDate: '2023-01-01',
    });

    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'backend',
      workExperienceId: job.id,
    });

    expect(project.profileId).toBe(alice.profileId);
    expect(project.workExperienceId).toBe(job.id);
    expect(project.featured).toBe(false);
    expect(project.technologyIds).toEqual([]);
    expect(project.previews).toEqual([]);
  });

  it("should refuse to link another profile's work experience", async () => {
    const bobsJob = await ctx.services.workExperiences.createWorkExperience(bob.userId, {
      jobTitle: 'Engineer',
      company: 'Acme',
      startDate: '2022-01-01',
    });

    await expect(
      ctx.services.projects.createProject(alice.userId, {
        title: 'Storefront',
        category: 'backend',
        workExperienceId: bobsJob.id,
      })
    ).rejects.toThrow('You cannot link a work experience you do not own');
    expect(await ctx.services.projects.getAllMyProjects(alice.userId)).toEqual([]);
  });

  it('should reject a missing work experience', async () => {
    await expect(
      ctx.services.projects.createProject(alice.userId, {
        title: 'Storefront',
        category: 'backend',
        workExperienceId: 42,
      })
    ).rejects.toThrow(WorkExperienceNotFoundError);
  });

  it('should de-duplicate and verify technology ids', async () => {
    const ts = await createTechnology(alice.userId, 'TypeScript');
    const pg = await createTechnology(alice.userId, 'PostgreSQL');

    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'backend',
      technologyIds: [pg, ts, pg],
    });

    expect(project.technologyIds).toEqual([ts, pg].sort((a, b) => a - b));
  });

  it('should reject unknown or foreign technology ids', async () => {
    const bobsTech = await createTechnology(bob.userId, 'Go');

    await expect(
      ctx.services.projects.createProject(alice.userId, {
        title: 'Storefront',
        category: 'backend',
        technologyIds: [999],
      })
    ).rejects.toThrow(TechnologyNotFoundError);

    await expect(
      ctx.services.projects.createProject(alice.userId, {
        title: 'Storefront',
        category: 'backend',
        technologyIds: [bobsTech],
      })
    ).rejects.toThrow(UnauthorizedAccessError);
  });

  it('should replace every technology link on update', async () => {
    const t1 = await createTechnology(alice.userId, 'One');
    const t2 = await createTechnology(alice.userId, 'Two');
    const t3 = await createTechnology(alice.userId, 'Three');
    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'backend',
      technologyIds: [t1, t2],
    });

    const updated = await ctx.services.projects.updateProject(alice.userId, project.id, {
      technologyIds: [t3],
    });

    expect(updated.technologyIds).toEqual([t3]);
    const links = ctx.repos.projectTechs.all().filter((link) => link.projectId === project.id);
    expect(links.filter((link) => link.isActive).map((link) => link.techId)).toEqual([t3]);
    expect(links.filter((link) => !link.isActive).map((link) => link.techId)).toEqual([t1, t2]);
  });

  it('should keep links and previews when the update leaves them out', async () => {
    const t1 = await createTechnology(alice.userId, 'One');
    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'backend',
      technologyIds: [t1],
      previews: [{ imageUrl: 'https://img.test/1.png' }],
    });

    const updated = await ctx.services.projects.updateProject(alice.userId, project.id, {
      title: 'Storefront v2',
    });

    expect(updated.title).toBe('Storefront v2');
    expect(updated.technologyIds).toEqual([t1]);
    expect(updated.previews.map((p) => p.imageUrl)).toEqual(['https://img.test/1.png']);
  });

  it('should revive a re-linked technology with fresh audit stamps', async () => {
    const t1 = await createTechnology(alice.userId, 'One');
    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'backend',
      technologyIds: [t1],
    });
    await ctx.services.projects.updateProject(alice.userId, project.id, { technologyIds: [] });
    await ctx.services.projects.updateProject(alice.userId, project.id, { technologyIds: [t1] });

    const links = ctx.repos.projectTechs.all().filter((link) => link.projectId === project.id);
    expect(links).toHaveLength(1);
    expect(links[0]).toMatchObject({
      techId: t1,
      isActive: true,
      updatedAt: null,
      updatedBy: null,
      createdBy: alice.userId,
    });
  });

  it('should store previews in display order and replace them all', async () => {
    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'frontend',
      previews: [
        { imageUrl: 'https://img.test/b.png', order: 2 },
        { imageUrl: 'https://img.test/a.png', caption: 'Home', order: 1 },
      ],
    });

    expect(project.previews.map((p) => [p.imageUrl, p.caption, p.order])).toEqual([
      ['https://img.test/a.png', 'Home', 1],
      ['https://img.test/b.png', null, 2],
    ]);

    const updated = await ctx.services.projects.updateProject(alice.userId, project.id, {
      previews: [{ imageUrl: 'https://img.test/c.png' }],
    });
    expect(updated.previews.map((p) => [p.imageUrl, p.order])).toEqual([
      ['https://img.test/c.png', 0],
    ]);
  });

  it('should unlink the work experience when given null', async () => {
    const job = await ctx.services.workExperiences.createWorkExperience(alice.userId, {
      jobTitle: 'Engineer',
      company: 'Acme',
      startDate: '2022-01-01',
    });
    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'backend',
      workExperienceId: job.id,
    });

    const updated = await ctx.services.projects.updateProject(alice.userId, project.id, {
      workExperienceId: null,
    });
    expect(updated.workExperienceId).toBeNull();
  });

  it('should list featured projects first, and featured-only on request', async () => {
    const plain = await ctx.services.projects.createProject(alice.userId, {
      title: 'Plain',
      category: 'backend',
    });
    const star = await ctx.services.projects.createProject(alice.userId, {
      title: 'Star',
      category: 'backend',
      featured: true,
    });
    const newest = await ctx.services.projects.createProject(alice.userId, {
      title: 'Newest',
      category: 'backend',
    });

    const all = await ctx.services.projects.getAllMyProjects(alice.userId);
    expect(all.map((p) => p.id)).toEqual([star.id, newest.id, plain.id]);

    const featured = await ctx.services.projects.getFeaturedMyProjects(alice.userId);
    expect(featured.map((p) => p.title)).toEqual(['Star']);
  });

  it("should not let another user read or delete the project", async () => {
    const project = await ctx.services.projects.createProject(alice.userId, {
      title: 'Storefront',
      category: 'backend',
    });

    await expect(ctx.services.projects.getProjectById(bob.userId, project.id)).rejects.toThrow(
      UnauthorizedAccessError
    );
    await expect(ctx.services.projects.deleteProject(bob.userId, project.id)).rejects.toThrow(
      UnauthorizedAccessError
    );

    await ctx.services.projects.deleteProject(alice.userId, project.id);
    await expect(ctx.services.projects.getProjectById(alice.userId, project.id)).rejects.toThrow(
      ProjectNotFoundError
    );
  });
});
