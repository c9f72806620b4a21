import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ProfileAlreadyExistsError, UserAlreadyExistsError } from '../../../application/errors.js';
import { buildServices, type AppServices } from '../../../application/services.js';
import { FakePasswordHasher, FakeTokenManager, seedUserWithProfile } from '../../../test/fakes.js';
import { runMigrations } from '../migrate.js';
import { pool } from '../pool.js';
import { createPgRepositories } from '../repositories.js';
import { UserRepo } from '../userRepo.js';
import { ProfileRepo } from '../profileRepo.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('pg repositories', () => {
  const username = `pg${Date.now().toString(36)}${Math.random().toString(16).slice(2, 6)}`;
  let services: AppServices;
  let userId: number;
  let profileId: number;

  beforeAll(async () => {
    await runMigrations(pool);
    services = buildServices(createPgRepositories(pool), {
      hasher: new FakePasswordHasher(),
      tokens: new FakeTokenManager(),
    });
    ({ userId, profileId } = await seedUserWithProfile(services, username));
  });

  afterAll(async () => {
    if (profileId) {
      const projects = 'SELECT id FROM projects WHERE profile_id = $1';
      await pool.query(`DELETE FROM project_technologies WHERE project_id IN (${projects})`, [
        profileId,
      ]);
      await pool.query(`DELETE FROM project_previews WHERE project_id IN (${projects})`, [
        profileId,
      ]);
      for (const table of ['projects', 'technologies', 'work_experiences', 'clients', 'socials']) {
        await pool.query(`DELETE FROM ${table} WHERE profile_id = $1`, [profileId]);
      }
      await pool.query('DELETE FROM profiles WHERE id = $1', [profileId]);
    }
    if (userId) {
      await pool.query('DELETE FROM users WHERE id = $1', [userId]);
    }
    await pool.end();
  });

  it('should round-trip a work experience with plain dates', async () => {
    const job = await services.workExperiences.createWorkExperience(userId, {
      jobTitle: 'Engineer',
      company: 'Acme',
      startDate: '2022-01-01',
      endDate: '2023-01-01',
    });

    const loaded = await services.workExperiences.getWorkExperienceById(userId, job.id);

    expect(loaded.startDate).toBe('2022-01-01');
    expect(loaded.endDate).toBe('2023-01-01');
    expect(loaded.profileId).toBe(profileId);
    expect(loaded.createdBy).toBe(userId);
  });

  it('should revive a previously unlinked technology', async () => {
    const node = await services.technologies.createTechnology(userId, {
      name: 'Node',
      category: 'backend',
    });
    const pg = await services.technologies.createTechnology(userId, {
      name: 'Postgres',
      category: 'databases',
    });

    const project = await services.projects.createProject(userId, {
      title: 'API',
      category: 'backend',
      technologyIds: [node.id, pg.id],
    });
    await services.projects.updateProject(userId, project.id, { technologyIds: [pg.id] });
    const revived = await services.projects.updateProject(userId, project.id, {
      technologyIds: [node.id],
    });

    expect(revived.technologyIds).toEqual([node.id]);
  });

  it('should leave soft-deleted technologies out of the links', async () => {
    const kept = await services.technologies.createTechnology(userId, {
      name: 'Redis',
      category: 'databases',
    });
    const dropped = await services.technologies.createTechnology(userId, {
      name: 'Kafka',
      category: 'backend',
    });
    const project = await services.projects.createProject(userId, {
      title: 'Queue',
      category: 'backend',
      technologyIds: [kept.id, dropped.id],
    });

    await services.technologies.deleteTechnology(userId, dropped.id);

    const loaded = await services.projects.getProjectById(userId, project.id);
    expect(loaded.technologyIds).toEqual([kept.id]);
  });

  it('should replace previews in order', async () => {
    const project = await services.projects.createProject(userId, {
      title: 'Site',
      category: 'frontend',
      previews: [
        { imageUrl: 'https://cdn.test/a.png', order: 2 },
        { imageUrl: 'https://cdn.test/b.png', order: 1 },
      ],
    });

    expect(project.previews.map((p) => p.imageUrl)).toEqual([
      'https://cdn.test/b.png',
      'https://cdn.test/a.png',
    ]);

    const updated = await services.projects.updateProject(userId, project.id, { previews: [] });
    expect(updated.previews).toEqual([]);
  });

  it('should hide a soft-deleted client', async () => {
    const client = await services.clients.createClient(userId, { name: 'Globex' });

    expect(await services.clients.deleteClient(userId, client.id)).toBe(true);
    await expect(services.clients.getClientById(userId, client.id)).rejects.toThrow(
      'Client not found'
    );

    const row = await pool.query<{ is_active: boolean; updated_by: number }>(
      'SELECT is_active, updated_by FROM clients WHERE id = $1',
      [client.id]
    );
    expect(row.rows[0]).toEqual({ is_active: false, updated_by: userId });
  });

  it('should turn a racing duplicate registration into a conflict', async () => {
    const users = new UserRepo(pool);
    const existing = await users.findById(userId);
    if (!existing) throw new Error('seeded user missing');

    await expect(
      users.save({
        username: existing.username,
        email: `other-${existing.email}`,
        passwordHash: 'hashed',
        role: 'admin',
      })
    ).rejects.toThrow(UserAlreadyExistsError);
    await expect(
      users.save({
        username: `${existing.username}x`,
        email: existing.email,
        passwordHash: 'hashed',
        role: 'admin',
      })
    ).rejects.toThrow(`Email ${existing.email} is already registered`);
  });

  it('should turn a racing second profile into a conflict', async () => {
    const profiles = new ProfileRepo(pool);
    const existing = await profiles.findById(profileId);
    if (!existing) throw new Error('seeded profile missing');

    await expect(
      profiles.save({
        userId: existing.userId,
        name: 'Second',
        lastName: 'Profile',
        email: existing.email,
        currentTitle: null,
        bioSummary: null,
        phone: null,
        location: null,
        photoUrl: null,
        createdBy: userId,
      })
    ).rejects.toThrow(ProfileAlreadyExistsError);
  });
});
