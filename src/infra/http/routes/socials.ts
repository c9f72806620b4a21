import { Router } from 'express';
import { z } from 'zod';
import type { AppServices } from '../../../application/services.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser, type RouteGuards } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { idParamsSchema, nullableText } from './schemas.js';

/**
 * @openapi
 * /api/social:
 *   post:
 *     tags: [Social]
 *     summary: Add a social link
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [platform, url]
 *             properties:
 *               platform: { type: string }
 *               url: { type: string }
 *               iconName: { type: string, nullable: true }
 *               order: { type: integer, default: 0 }
 *     responses:
 *       201:
 *         description: Created
 *
 * /api/social/me:
 *   get:
 *     tags: [Social]
 *     summary: The caller's social links, in display order
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: List
 *
 * /api/social/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: integer }
 *   get:
 *     tags: [Social]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Social link
 *   put:
 *     tags: [Social]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Updated
 *   delete:
 *     tags: [Social]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       204:
 *         description: Deleted
 */

const createBodySchema = z.object({
  platform: z.string().min(1).max(50),
  url: z.string().min(1).max(2048),
  iconName: nullableText(50),
  order: z.number().int().optional(),
});

const updateBodySchema = z.object({
  platform: z.string().min(1).max(50).optional(),
  url: z.string().min(1).max(2048).optional(),
  iconName: nullableText(50),
  order: z.number().int().optional(),
});

export function createSocialRoutes(services: AppServices, guards: RouteGuards) {
  const router = Router();
  const socials = services.socials;

  router.use(guards.requireAuth);

  router.post(
    '/',
    guards.requireAdmin,
    validate({ body: createBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createBodySchema.parse(req.body);
      res.status(201).json(await socials.createSocial(currentUser(req).id, body));
    })
  );

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      res.status(200).json(await socials.getAllMySocials(currentUser(req).id));
    })
  );

  router.get(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.status(200).json(await socials.getSocialById(currentUser(req).id, id));
    })
  );

  router.put(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema, body: updateBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = updateBodySchema.parse(req.body);
      res.status(200).json(await socials.updateSocial(currentUser(req).id, id, body));
    })
  );

  router.delete(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await socials.deleteSocial(currentUser(req).id, id);
      res.status(204).send();
    })
  );

  return router;
}
