import express from 'express';
import type { AppServices } from '../../application/services.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { authMiddleware, requireRole, type RouteGuards } from './middleware/auth.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createRateLimiters, type RateLimitSettings } from './middleware/rateLimit.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createClientRoutes } from './routes/clients.js';
import { createImageRoutes } from './routes/images.js';
import { createProfileRoutes } from './routes/profile.js';
import { createProjectRoutes } from './routes/projects.js';
import { createPublicRoutes } from './routes/public.js';
import { createSocialRoutes } from './routes/socials.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createTechnologyRoutes } from './routes/technologies.js';
import { createWorkExperienceRoutes } from './routes/workExperience.js';

export interface AppDependencies {
  services: AppServices;
  /** Resolves when the database answers. Backs /healthz. */
  checkDatabase: () => Promise<unknown>;
  logger?: Logger;
  rateLimit?: RateLimitSettings;
  maxImageBytes?: number;
}

const DEFAULT_RATE_LIMIT: RateLimitSettings = { perMinute: 60, loginPerMinute: 10 };
const DEFAULT_MAX_IMAGE_BYTES = 5 * 1024 * 1024;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies) {
  const { services } = deps;
  const logger = deps.logger ?? defaultLogger;
  const limiters = createRateLimiters(deps.rateLimit ?? DEFAULT_RATE_LIMIT);

  const guards: RouteGuards = {
    requireAuth: authMiddleware(services.authenticate),
    requireAdmin: requireRole('admin'),
  };

  const app = express();

  app.use(requestLogger(logger));
  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.checkDatabase(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  app.use('/api', limiters.api);
  app.use('/api/auth', createAuthRoutes(services, guards, limiters.login));
  app.use('/api/profile', createProfileRoutes(services, guards));
  app.use('/api/work-experience', createWorkExperienceRoutes(services, guards));
  app.use('/api/projects', createProjectRoutes(services, guards));
  app.use('/api/technologies', createTechnologyRoutes(services, guards));
  app.use('/api/clients', createClientRoutes(services, guards));
  app.use('/api/social', createSocialRoutes(services, guards));
  app.use('/api/public', createPublicRoutes(services));

  if (services.uploadImage) {
    app.use(
      '/api/images',
      createImageRoutes(
        services.uploadImage,
        guards,
        deps.maxImageBytes ?? DEFAULT_MAX_IMAGE_BYTES
      )
    );
  }

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}
