import { Router } from 'express';
import type { AppServices } from '../../../application/services.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { validate } from '../middleware/validate.js';
import { usernameAndIdParamsSchema, usernameParamsSchema } from './schemas.js';

/**
 * @openapi
 * /api/public/{username}/profile:
 *   get:
 *     tags: [Public]
 *     summary: A user's published profile
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Profile
 *       404:
 *         description: Unknown user, or user without a profile
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/public/{username}/projects:
 *   get:
 *     tags: [Public]
 *     summary: A user's projects, featured first
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: List
 *
 * /api/public/{username}/projects/featured:
 *   get:
 *     tags: [Public]
 *     summary: A user's featured projects
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: List
 *
 * /api/public/{username}/projects/{id}:
 *   get:
 *     tags: [Public]
 *     summary: One of a user's projects
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: Project
 *       404:
 *         description: Not found for this user
 *
 * /api/public/{username}/work-experience:
 *   get:
 *     tags: [Public]
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: List
 *
 * /api/public/{username}/technologies:
 *   get:
 *     tags: [Public]
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: List
 *
 * /api/public/{username}/clients:
 *   get:
 *     tags: [Public]
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: List
 *
 * /api/public/{username}/social:
 *   get:
 *     tags: [Public]
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: List
 */

export function createPublicRoutes(services: AppServices) {
  const router = Router();
  const portfolio = services.publicPortfolio;

  router.get(
    '/:username/profile',
    validate({ params: usernameParamsSchema }),
    asyncHandler(async (req, res) => {
      const { username } = usernameParamsSchema.parse(req.params);
      res.status(200).json(await portfolio.getProfile(username));
    })
  );

  router.get(
    '/:username/projects',
    validate({ params: usernameParamsSchema }),
    asyncHandler(async (req, res) => {
      const { username } = usernameParamsSchema.parse(req.params);
      res.status(200).json(await portfolio.listProjects(username));
    })
  );

  router.get(
    '/:username/projects/featured',
    validate({ params: usernameParamsSchema }),
    asyncHandler(async (req, res) => {
      const { username } = usernameParamsSchema.parse(req.params);
      res.status(200).json(await portfolio.listFeaturedProjects(username));
    })
  );

  router.get(
    '/:username/projects/:id',
    validate({ params: usernameAndIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { username, id } = usernameAndIdParamsSchema.parse(req.params);
      res.status(200).json(await portfolio.getProject(username, id));
    })
  );

  router.get(
    '/:username/work-experience',
    validate({ params: usernameParamsSchema }),
    asyncHandler(async (req, res) => {
      const { username } = usernameParamsSchema.parse(req.params);
      res.status(200).json(await portfolio.listWorkExperiences(username));
    })
  );

  router.get(
    '/:username/technologies',
    validate({ params: usernameParamsSchema }),
    asyncHandler(async (req, res) => {
      const { username } = usernameParamsSchema.parse(req.params);
      res.status(200).json(await portfolio.listTechnologies(username));
    })
  );

  router.get(
    '/:username/clients',
    validate({ params: usernameParamsSchema }),
    asyncHandler(async (req, res) => {
      const { username } = usernameParamsSchema.parse(req.params);
      res.status(200).json(await portfolio.listClients(username));
    })
  );

  router.get(
    '/:username/social',
    validate({ params: usernameParamsSchema }),
    asyncHandler(async (req, res) => {
      const { username } = usernameParamsSchema.parse(req.params);
      res.status(200).json(await portfolio.listSocials(username));
    })
  );

  return router;
}
