import { Router } from 'express';
import { z } from 'zod';
import type { AppServices } from '../../../application/services.js';
import { PROJECT_CATEGORIES } from '../../../domain/portfolio/project.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser, type RouteGuards } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { idParamsSchema, nullableText } from './schemas.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     ProjectInput:
 *       type: object
 *       properties:
 *         title: { type: string }
 *         category: { type: string, enum: [fullstack, backend, frontend] }
 *         description: { type: string, nullable: true }
 *         thumbnailUrl: { type: string, nullable: true }
 *         liveUrl: { type: string, nullable: true }
 *         repoUrl: { type: string, nullable: true }
 *         featured: { type: boolean }
 *         workExperienceId: { type: integer, nullable: true }
 *         technologyIds:
 *           type: array
 *           description: Replaces every linked technology when present
 *           items: { type: integer }
 *         previews:
 *           type: array
 *           description: Replaces every preview image when present
 *           items:
 *             type: object
 *             required: [imageUrl]
 *             properties:
 *               imageUrl: { type: string }
 *               caption: { type: string, nullable: true }
 *               order: { type: integer }
 *
 * /api/projects:
 *   post:
 *     tags: [Projects]
 *     summary: Create a project
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/ProjectInput'
 *     responses:
 *       201:
 *         description: Created, with technologyIds and previews
 *       403:
 *         description: Linked work experience or technology belongs to another profile
 *       404:
 *         description: Linked work experience or technology not found
 *
 * /api/projects/me:
 *   get:
 *     tags: [Projects]
 *     summary: The caller's projects, featured first
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: List
 *
 * /api/projects/featured:
 *   get:
 *     tags: [Projects]
 *     summary: The caller's featured projects
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: List
 *
 * /api/projects/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: integer }
 *   get:
 *     tags: [Projects]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Project
 *       403:
 *         description: Belongs to another profile
 *       404:
 *         description: Not found
 *   put:
 *     tags: [Projects]
 *     summary: Patch a project
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/ProjectInput'
 *     responses:
 *       200:
 *         description: Updated
 *   delete:
 *     tags: [Projects]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       204:
 *         description: Deleted
 */

const previewSchema = z.object({
  imageUrl: z.string().min(1).max(2048),
  caption: nullableText(255),
  order: z.number().int().optional(),
});

const linkFields = {
  workExperienceId: z.number().int().positive().nullable().optional(),
  technologyIds: z.array(z.number().int().positive()).max(100).optional(),
  previews: z.array(previewSchema).max(50).optional(),
};

const optionalProjectFields = {
  description: z.string().nullable().optional(),
  thumbnailUrl: nullableText(2048),
  liveUrl: nullableText(2048),
  repoUrl: nullableText(2048),
};

const createBodySchema = z.object({
  title: z.string().min(1).max(200),
  category: z.enum(PROJECT_CATEGORIES),
  featured: z.boolean().optional(),
  ...optionalProjectFields,
  ...linkFields,
});

const updateBodySchema = z.object({
  title: z.string().min(1).max(200).optional(),
  category: z.enum(PROJECT_CATEGORIES).optional(),
  featured: z.boolean().optional(),
  ...optionalProjectFields,
  ...linkFields,
});

export function createProjectRoutes(services: AppServices, guards: RouteGuards) {
  const router = Router();
  const projects = services.projects;

  router.use(guards.requireAuth);

  router.post(
    '/',
    guards.requireAdmin,
    validate({ body: createBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createBodySchema.parse(req.body);
      res.status(201).json(await projects.createProject(currentUser(req).id, body));
    })
  );

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      res.status(200).json(await projects.getAllMyProjects(currentUser(req).id));
    })
  );

  router.get(
    '/featured',
    asyncHandler(async (req, res) => {
      res.status(200).json(await projects.getFeaturedMyProjects(currentUser(req).id));
    })
  );

  router.get(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.status(200).json(await projects.getProjectById(currentUser(req).id, id));
    })
  );

  router.put(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema, body: updateBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = updateBodySchema.parse(req.body);
      res.status(200).json(await projects.updateProject(currentUser(req).id, id, body));
    })
  );

  router.delete(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await projects.deleteProject(currentUser(req).id, id);
      res.status(204).send();
    })
  );

  return router;
}
