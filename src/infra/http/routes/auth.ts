import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { UnauthorizedError } from '../../../application/errors.js';
import type { AppServices } from '../../../application/services.js';
import { toUserView } from '../../../domain/auth/user.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser, type RouteGuards } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string, minLength: 3, maxLength: 50 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email or username already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive an access token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 accessToken: { type: string }
 *                 tokenType: { type: string, example: bearer }
 *       401:
 *         description: Incorrect email or password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: The authenticated user
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Current user
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       401:
 *         description: Missing or invalid token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const registerBodySchema = z.object({
  username: z.string().trim().min(3).max(50),
  email: z.string().trim().email(),
  password: z.string().min(8),
});

const loginBodySchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export function createAuthRoutes(
  services: AppServices,
  guards: Pick<RouteGuards, 'requireAuth'>,
  loginRateLimiter: RequestHandler
) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const user = await services.register.execute(body);
      res.status(201).json(toUserView(user));
    })
  );

  router.post(
    '/login',
    loginRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await services.login.execute(body);
      if (!result) {
        throw new UnauthorizedError('Incorrect email or password');
      }
      res.status(200).json(result);
    })
  );

  router.get(
    '/me',
    guards.requireAuth,
    asyncHandler(async (req, res) => {
      res.status(200).json(toUserView(currentUser(req)));
    })
  );

  return router;
}
