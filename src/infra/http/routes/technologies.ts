import { Router } from 'express';
import { z } from 'zod';
import type { AppServices } from '../../../application/services.js';
import { TECHNOLOGY_CATEGORIES } from '../../../domain/portfolio/technology.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser, type RouteGuards } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { idParamsSchema, nullableText } from './schemas.js';

/**
 * @openapi
 * /api/technologies:
 *   post:
 *     tags: [Technologies]
 *     summary: Add a technology to the caller's profile
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, category]
 *             properties:
 *               name: { type: string }
 *               category:
 *                 type: string
 *                 enum: [frontend, backend, databases, apis, dev_tools, cloud, testing, architecture, security]
 *               iconUrl: { type: string, nullable: true }
 *     responses:
 *       201:
 *         description: Created
 *
 * /api/technologies/me:
 *   get:
 *     tags: [Technologies]
 *     summary: The caller's technologies, by name
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: List
 *
 * /api/technologies/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: integer }
 *   get:
 *     tags: [Technologies]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Technology
 *       403:
 *         description: Belongs to another profile
 *       404:
 *         description: Not found
 *   put:
 *     tags: [Technologies]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Updated
 *   delete:
 *     tags: [Technologies]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       204:
 *         description: Deleted
 */

const createBodySchema = z.object({
  name: z.string().min(1).max(100),
  category: z.enum(TECHNOLOGY_CATEGORIES),
  iconUrl: nullableText(2048),
});

const updateBodySchema = z.object({
  name: z.string().min(1).max(100).optional(),
  category: z.enum(TECHNOLOGY_CATEGORIES).optional(),
  iconUrl: nullableText(2048),
});

export function createTechnologyRoutes(services: AppServices, guards: RouteGuards) {
  const router = Router();
  const technologies = services.technologies;

  router.use(guards.requireAuth);

  router.post(
    '/',
    guards.requireAdmin,
    validate({ body: createBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createBodySchema.parse(req.body);
      res.status(201).json(await technologies.createTechnology(currentUser(req).id, body));
    })
  );

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      res.status(200).json(await technologies.getAllMyTechnologies(currentUser(req).id));
    })
  );

  router.get(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.status(200).json(await technologies.getTechnologyById(currentUser(req).id, id));
    })
  );

  router.put(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema, body: updateBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = updateBodySchema.parse(req.body);
      res.status(200).json(await technologies.updateTechnology(currentUser(req).id, id, body));
    })
  );

  router.delete(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await technologies.deleteTechnology(currentUser(req).id, id);
      res.status(204).send();
    })
  );

  return router;
}
