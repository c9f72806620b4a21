import { Router } from 'express';
import { z } from 'zod';
import type { AppServices } from '../../../application/services.js';
import { BIO_SUMMARY_MAX_LENGTH } from '../../../domain/portfolio/profile.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser, type RouteGuards } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { nullableText } from './schemas.js';

/**
 * @openapi
 * /api/profile:
 *   post:
 *     tags: [Profile]
 *     summary: Create the caller's profile
 *     description: Each user has at most one profile. The email defaults to the account email.
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/ProfileInput'
 *     responses:
 *       201:
 *         description: Profile created
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: User already has a profile
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/profile/me:
 *   get:
 *     tags: [Profile]
 *     summary: The caller's profile
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Profile
 *       404:
 *         description: No profile yet
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *   put:
 *     tags: [Profile]
 *     summary: Patch the caller's profile
 *     description: Omitted fields are kept; null clears an optional field.
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/ProfileInput'
 *     responses:
 *       200:
 *         description: Updated profile
 *       404:
 *         description: No profile yet
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const optionalProfileFields = {
  currentTitle: nullableText(150),
  bioSummary: z.string().max(BIO_SUMMARY_MAX_LENGTH).nullable().optional(),
  phone: nullableText(50),
  location: nullableText(150),
  photoUrl: nullableText(2048),
};

const createProfileBodySchema = z.object({
  name: z.string().min(1).max(100),
  lastName: z.string().min(1).max(100),
  email: z.string().trim().email().optional(),
  ...optionalProfileFields,
});

const updateProfileBodySchema = z.object({
  name: z.string().min(1).max(100).optional(),
  lastName: z.string().min(1).max(100).optional(),
  email: z.string().trim().email().optional(),
  ...optionalProfileFields,
});

export function createProfileRoutes(services: AppServices, guards: RouteGuards) {
  const router = Router();

  router.use(guards.requireAuth);

  router.post(
    '/',
    validate({ body: createProfileBodySchema }),
    asyncHandler(async (req, res) => {
      const user = currentUser(req);
      const body = createProfileBodySchema.parse(req.body);
      const profile = await services.profiles.createProfile(user.id, {
        ...body,
        email: body.email ?? user.email,
      });
      res.status(201).json(profile);
    })
  );

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      const profile = await services.profiles.getMyProfile(currentUser(req).id);
      res.status(200).json(profile);
    })
  );

  router.put(
    '/me',
    validate({ body: updateProfileBodySchema }),
    asyncHandler(async (req, res) => {
      const body = updateProfileBodySchema.parse(req.body);
      const profile = await services.profiles.updateMyProfile(currentUser(req).id, body);
      res.status(200).json(profile);
    })
  );

  return router;
}
