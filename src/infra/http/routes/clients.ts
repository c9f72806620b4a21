import { Router } from 'express';
import { z } from 'zod';
import type { AppServices } from '../../../application/services.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser, type RouteGuards } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { idParamsSchema, nullableText } from './schemas.js';

/**
 * @openapi
 * /api/clients:
 *   post:
 *     tags: [Clients]
 *     summary: Add a client testimonial
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name]
 *             properties:
 *               name: { type: string }
 *               company: { type: string, nullable: true }
 *               feedback: { type: string, nullable: true }
 *               clientPhotoUrl: { type: string, nullable: true }
 *               projectLink: { type: string, nullable: true }
 *     responses:
 *       201:
 *         description: Created
 *
 * /api/clients/me:
 *   get:
 *     tags: [Clients]
 *     summary: The caller's clients, by name
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: List
 *
 * /api/clients/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: integer }
 *   get:
 *     tags: [Clients]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Client
 *       403:
 *         description: Belongs to another profile
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       404:
 *         description: Not found
 *   put:
 *     tags: [Clients]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Updated
 *   delete:
 *     tags: [Clients]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       204:
 *         description: Deleted
 */

const optionalClientFields = {
  company: nullableText(150),
  feedback: z.string().nullable().optional(),
  clientPhotoUrl: nullableText(2048),
  projectLink: nullableText(2048),
};

const createBodySchema = z.object({
  name: z.string().min(1).max(150),
  ...optionalClientFields,
});

const updateBodySchema = z.object({
  name: z.string().min(1).max(150).optional(),
  ...optionalClientFields,
});

export function createClientRoutes(services: AppServices, guards: RouteGuards) {
  const router = Router();
  const clients = services.clients;

  router.use(guards.requireAuth);

  router.post(
    '/',
    guards.requireAdmin,
    validate({ body: createBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createBodySchema.parse(req.body);
      res.status(201).json(await clients.createClient(currentUser(req).id, body));
    })
  );

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      res.status(200).json(await clients.getAllMyClients(currentUser(req).id));
    })
  );

  router.get(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.status(200).json(await clients.getClientById(currentUser(req).id, id));
    })
  );

  router.put(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema, body: updateBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = updateBodySchema.parse(req.body);
      res.status(200).json(await clients.updateClient(currentUser(req).id, id, body));
    })
  );

  router.delete(
    '/:id',
    guards.requireAdmin,
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await clients.deleteClient(currentUser(req).id, id);
      res.status(204).send();
    })
  );

  return router;
}
