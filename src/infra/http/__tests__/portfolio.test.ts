import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { createTestApp, registerAndLogin, type TestApp } from './helpers.js';

describe('Portfolio API', () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  async function createProfile(auth: string, name: string) {
    return request(t.app)
      .post('/api/profile')
      .set('Authorization', auth)
      .send({ name, lastName: 'Tester' })
      .expect(201);
  }

  describe('end to end', () => {
    it('should register, create a profile, add a position and link a project to it', async () => {
      const auth = await registerAndLogin(t.app, 'alice');

      const profile = await createProfile(auth, 'alice');
      expect(profile.body).toMatchObject({ name: 'Alice', email: 'alice@example.com' });

      const job = await request(t.app)
        .post('/api/work-experience')
        .set('Authorization', auth)
        .send({
          jobTitle: 'Engineer',
          company: 'Acme',
          startDate: '2022-01-01',
          endDate: '2023-01-01',
        });
      expect(job.status).toBe(201);
      expect(job.body).toMatchObject({
        profileId: profile.body.id,
        startDate: '2022-01-01',
        endDate: '2023-01-01',
      });

      const project = await request(t.app)
        .post('/api/projects')
        .set('Authorization', auth)
        .send({ title: 'Portfolio', category: 'fullstack', workExperienceId: job.body.id });
      expect(project.status).toBe(201);
      expect(project.body).toMatchObject({
        title: 'Portfolio',
        workExperienceId: job.body.id,
        technologyIds: [],
        previews: [],
      });

      const mine = await request(t.app).get('/api/projects/me').set('Authorization', auth);
      expect(mine.status).toBe(200);
      expect(mine.body).toHaveLength(1);
    });

    it("should deny a user reading another user's client and allow the owner", async () => {
      const alice = await registerAndLogin(t.app, 'alice');
      const bob = await registerAndLogin(t.app, 'bob');
      await createProfile(alice, 'alice');
      await createProfile(bob, 'bob');

      const client = await request(t.app)
        .post('/api/clients')
        .set('Authorization', alice)
        .send({ name: 'Globex', feedback: 'Great work' })
        .expect(201);

      const asBob = await request(t.app)
        .get(`/api/clients/${client.body.id}`)
        .set('Authorization', bob);
      expect(asBob.status).toBe(403);
      expect(asBob.body).toEqual({
        code: 'ACCESS_DENIED',
        message: 'You do not have access to this client',
      });

      const asAlice = await request(t.app)
        .get(`/api/clients/${client.body.id}`)
        .set('Authorization', alice);
      expect(asAlice.status).toBe(200);
      expect(asAlice.body.name).toBe('Globex');
    });
  });

  describe('profile', () => {
    it('should reject a second profile with 409', async () => {
      const auth = await registerAndLogin(t.app, 'alice');
      await createProfile(auth, 'alice');

      const again = await request(t.app)
        .post('/api/profile')
        .set('Authorization', auth)
        .send({ name: 'Other', lastName: 'Person' });
      expect(again.status).toBe(409);
      expect(again.body.code).toBe('CONFLICT');
    });

    it('should return 404 before a profile exists and patch afterwards', async () => {
      const auth = await registerAndLogin(t.app, 'alice');

      const missing = await request(t.app).get('/api/profile/me').set('Authorization', auth);
      expect(missing.status).toBe(404);

      await createProfile(auth, 'alice');
      const updated = await request(t.app)
        .put('/api/profile/me')
        .set('Authorization', auth)
        .send({ currentTitle: 'Engineer' });
      expect(updated.status).toBe(200);
      expect(updated.body).toMatchObject({ currentTitle: 'Engineer', name: 'Alice' });
    });

    it('should answer 400 PROFILE_REQUIRED for sub-resources without a profile', async () => {
      const auth = await registerAndLogin(t.app, 'alice');

      const res = await request(t.app)
        .post('/api/technologies')
        .set('Authorization', auth)
        .send({ name: 'Go', category: 'backend' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ code: 'PROFILE_REQUIRED', message: 'User has no profile' });
    });
  });

  describe('sub-resources', () => {
    let auth: string;

    beforeEach(async () => {
      auth = await registerAndLogin(t.app, 'alice');
      await createProfile(auth, 'alice');
    });

    it('should ignore a client-supplied profile id', async () => {
      const res = await request(t.app)
        .post('/api/social')
        .set('Authorization', auth)
        .send({ platform: 'github', url: 'https://github.test/alice', profileId: 999 });

      expect(res.status).toBe(201);
      expect(res.body.profileId).toBe(1);
    });

    it('should soft delete with 204 and then report 404', async () => {
      const created = await request(t.app)
        .post('/api/technologies')
        .set('Authorization', auth)
        .send({ name: 'Go', category: 'backend' })
        .expect(201);

      const del = await request(t.app)
        .delete(`/api/technologies/${created.body.id}`)
        .set('Authorization', auth);
      expect(del.status).toBe(204);

      const get = await request(t.app)
        .get(`/api/technologies/${created.body.id}`)
        .set('Authorization', auth);
      expect(get.status).toBe(404);
      expect(get.body).toEqual({ code: 'NOT_FOUND', message: 'Technology not found' });

      const list = await request(t.app).get('/api/technologies/me').set('Authorization', auth);
      expect(list.body).toEqual([]);
    });

    it('should replace technology links through the project update', async () => {
      const tech = async (name: string) =>
        (
          await request(t.app)
            .post('/api/technologies')
            .set('Authorization', auth)
            .send({ name, category: 'backend' })
            .expect(201)
        ).body.id;
      const t1 = await tech('Node');
      const t2 = await tech('Postgres');

      const project = await request(t.app)
        .post('/api/projects')
        .set('Authorization', auth)
        .send({ title: 'API', category: 'backend', technologyIds: [t1] })
        .expect(201);

      const updated = await request(t.app)
        .put(`/api/projects/${project.body.id}`)
        .set('Authorization', auth)
        .send({ technologyIds: [t2], featured: true });
      expect(updated.status).toBe(200);
      expect(updated.body.technologyIds).toEqual([t2]);
      expect(updated.body.featured).toBe(true);

      const featured = await request(t.app)
        .get('/api/projects/featured')
        .set('Authorization', auth);
      expect(featured.body.map((p: { id: number }) => p.id)).toEqual([project.body.id]);
    });

    it('should report request shape errors as VALIDATION_ERROR', async () => {
      const res = await request(t.app)
        .post('/api/work-experience')
        .set('Authorization', auth)
        .send({ jobTitle: 'Engineer', company: 'Acme', startDate: '01/01/2022' });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
      expect(res.body.details.issues[0].path).toBe('startDate');
    });

    it('should report entity invariant errors as INVALID_ENTITY', async () => {
      const res = await request(t.app)
        .post('/api/work-experience')
        .set('Authorization', auth)
        .send({
          jobTitle: 'Engineer',
          company: 'Acme',
          startDate: '2023-01-01',
          endDate: '2022-01-01',
        });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        code: 'INVALID_ENTITY',
        message: 'End date cannot be before start date',
        details: { field: 'endDate' },
      });
    });

    it('should reject a non-numeric id', async () => {
      const res = await request(t.app).get('/api/clients/abc').set('Authorization', auth);
      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('public portfolio', () => {
    it('should serve a portfolio without a token', async () => {
      const auth = await registerAndLogin(t.app, 'alice');
      await createProfile(auth, 'alice');
      await request(t.app)
        .post('/api/projects')
        .set('Authorization', auth)
        .send({ title: 'Shown', category: 'frontend', featured: true })
        .expect(201);

      const profile = await request(t.app).get('/api/public/alice/profile');
      expect(profile.status).toBe(200);
      expect(profile.body.name).toBe('Alice');

      const projects = await request(t.app).get('/api/public/alice/projects/featured');
      expect(projects.body.map((p: { title: string }) => p.title)).toEqual(['Shown']);
    });

    it("should answer 404 for another user's project", async () => {
      const alice = await registerAndLogin(t.app, 'alice');
      const bob = await registerAndLogin(t.app, 'bob');
      await createProfile(alice, 'alice');
      await createProfile(bob, 'bob');
      const bobsProject = await request(t.app)
        .post('/api/projects')
        .set('Authorization', bob)
        .send({ title: 'Private', category: 'backend' })
        .expect(201);

      const res = await request(t.app).get(`/api/public/alice/projects/${bobsProject.body.id}`);
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ code: 'NOT_FOUND', message: 'Project not found' });
    });

    it('should answer 404 for an unknown username', async () => {
      const res = await request(t.app).get('/api/public/nobody/social');
      expect(res.status).toBe(404);
      expect(res.body.message).toBe('User not found');
    });
  });
});
