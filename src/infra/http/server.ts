import { buildServices } from '../../application/services.js';
import { Argon2PasswordHasher } from '../../domain/auth/password.js';
import { loadConfig } from '../config.js';
import { pool } from '../db/pool.js';
import { createPgRepositories } from '../db/repositories.js';
import { createLogger } from '../logger.js';
import { JwtTokenManager } from '../security/jwtTokenManager.js';
import { S3ImageStorage } from '../storage/s3ImageStorage.js';
import { createApp } from './app.js';

const config = loadConfig();
const logger = createLogger({ name: 'portfolio-cms-api', level: config.logLevel });

const services = buildServices(
  createPgRepositories(pool),
  {
    hasher: new Argon2PasswordHasher(),
    tokens: new JwtTokenManager({
      secret: config.jwt.secret,
      algorithm: config.jwt.algorithm,
      expiresInMinutes: config.jwt.expiresInMinutes,
    }),
  },
  {
    superadminEmail: config.superadminEmail,
    imageStorage: config.imageStorage ? new S3ImageStorage(config.imageStorage) : undefined,
  }
);

const app = createApp({
  services,
  checkDatabase: () => pool.query('SELECT 1'),
  logger,
  rateLimit: config.rateLimit,
  maxImageBytes: config.maxImageBytes,
});

if (!config.imageStorage) {
  logger.warn('Image storage is not configured; /api/images is disabled');
}

app.listen(config.port, () => {
  logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
  logger.info(`API docs: http://localhost:${config.port}/docs`);
});

export default app;
