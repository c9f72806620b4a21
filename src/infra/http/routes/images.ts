import express, { Router } from 'express';
import { z } from 'zod';
import type { UploadImageUseCase } from '../../../application/images/uploadImage.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import type { RouteGuards } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /api/images/upload:
 *   post:
 *     tags: [Images]
 *     summary: Upload an image and get back its public URL
 *     description: The request body is the raw image; Content-Type must be image/*.
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: query
 *         name: folder
 *         schema: { type: string, default: uploads }
 *     requestBody:
 *       required: true
 *       content:
 *         image/*:
 *           schema:
 *             type: string
 *             format: binary
 *     responses:
 *       201:
 *         description: Stored
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 url: { type: string }
 *       400:
 *         description: Not an image, or empty body
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       413:
 *         description: Image too large
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const uploadQuerySchema = z.object({
  folder: z.string().min(1).max(64).optional(),
});

export function createImageRoutes(
  uploadImage: UploadImageUseCase,
  guards: RouteGuards,
  maxImageBytes: number
) {
  const router = Router();

  router.post(
    '/upload',
    guards.requireAuth,
    guards.requireAdmin,
    validate({ query: uploadQuerySchema }),
    express.raw({ type: () => true, limit: maxImageBytes }),
    asyncHandler(async (req, res) => {
      const { folder } = uploadQuerySchema.parse(req.query);
      const body = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const result = await uploadImage.execute({
        body,
        contentType: req.headers['content-type'] ?? '',
        folder,
      });
      res.status(201).json(result);
    })
  );

  return router;
}
