import { Router } from 'express';
import { z } from 'zod';
import type { AppServices } from '../../../application/services.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser, type RouteGuards } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { idParamsSchema, isoDateSchema, nullableText } from './schemas.js';

/**
 * @openapi
 * /api/work-experience:
 *   post:
 *     tags: [Work Experience]
 *     summary: Add a position to the caller's profile
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [jobTitle, company, startDate]
 *             properties:
 *               jobTitle: { type: string }
 *               company: { type: string }
 *               location: { type: string, nullable: true }
 *               startDate: { type: string, format: date }
 *               endDate: { type: string, format: date, nullable: true }
 *               description: { type: string, nullable: true }
 *     responses:
 *       201:
 *         description: Created
 *       400:
 *         description: Validation error or caller has no profile
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       403:
 *         description: Admin role required
 *
 * /api/work-experience/me:
 *   get:
 *     tags: [Work Experience]
 *     summary: The caller's positions, newest start date first
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: List
 *
 * /api/work-experience/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: integer }
 *   get:
 *     tags: [Work Experience]
 *     summary: One of the caller's positions
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Position
 *       403:
 *         description: Belongs to another profile
 *       404:
 *         description: Not found
 *   put:
 *     tags: [Work Experience]
 *     summary: Patch a position
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Updated
 *       403:
 *         description: Belongs to another profile
 *       404:
 *         description: Not found
 *   delete:
 *     tags: [Work Experience]
 *     summary: Soft-delete a position
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       204:
 *         description: Deleted
 *       403:
 *         description: Belongs to another profile
 *       404:
 *         description: Not found
 */

const createBodySchema = z.object({
  jobTitle: z.string().min(1).max(150),
  company: z.string().min(1).max(150),
  location: nullableText(150),
  startDate: isoDateSchema,
  endDate: isoDateSchema.nullable().optional(),
  description: z.string().nullable().optional(),
});

const updateBodySchema = z.object({
  jobTitle: z.string().min(1).max(150).optional(),
  company: z.string().min(1).max(150).optional(),
  location: nullableText(150),
  startDate: isoDateSchema.optional(),
  endDate: isoDateSchema.nullable().optional(),
  description: z.string().nullable().optional(),
});

export function createWorkExperienceRoutes(services: AppServices, guards: RouteGuards) {
  const router = Router();
  const workExperiences = services.workExperiences;

  router.use(guards.requireAuth);

  router.post(
    '/',
    guards.requireAdmin,
    validate({ body: createBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createBodySchema.parse(req.body);
      const created = await workExperiences.createWorkExperience(currentUser(req).id, body);
      res.status(201).json(created);
    })
  );

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      res.status(200).json(await workExperiences.getAllMyWorkExperiences(currentUser(req).id));
    })
  );

  router.get(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.status(200).json(await workExperiences.getWorkExperienceById(currentUser(req).id, id));
    })
  );

  router.put(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema, body: updateBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = updateBodySchema.parse(req.body);
      const updated = await workExperiences.updateWorkExperience(currentUser(req).id, id, body);
      res.status(200).json(updated);
    })
  );

  router.delete(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await workExperiences.deleteWorkExperience(currentUser(req).id, id);
      res.status(204).send();
    })
  );

  return router;
}
