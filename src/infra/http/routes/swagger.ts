import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from '../swagger.js';

/**
 * Swagger UI at /docs and the raw OpenAPI document at /docs.json.
 */
export function createSwaggerRoutes() {
  const router = Router();

  router.get('/docs.json', (_req, res) => {
    res.status(200).json(swaggerSpec);
  });

  router.use('/docs', swaggerUi.serve);
  router.get(
    '/docs',
    swaggerUi.setup(swaggerSpec, {
      customSiteTitle: 'Portfolio CMS API',
      customCss: '.swagger-ui .topbar { display: none }',
      swaggerOptions: { persistAuthorization: true },
    })
  );

  return router;
}
