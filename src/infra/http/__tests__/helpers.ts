import type { Express } from 'express';
import request from 'supertest';
import { createLogger } from '../../logger.js';
import { createApp } from '../app.js';
import type { RateLimitSettings } from '../middleware/rateLimit.js';
import { createTestContext, type TestContext } from '../../../test/fakes.js';

export interface TestApp extends TestContext {
  app: Express;
}

export function createTestApp(
  options: {
    superadminEmail?: string;
    checkDatabase?: () => Promise<unknown>;
    rateLimit?: RateLimitSettings;
  } = {}
): TestApp {
  const ctx = createTestContext({ superadminEmail: options.superadminEmail });
  const app = createApp({
    services: ctx.services,
    checkDatabase: options.checkDatabase ?? (async () => undefined),
    logger: createLogger({ name: 'test', level: 'silent' }),
    rateLimit: options.rateLimit ?? { perMinute: 10_000, loginPerMinute: 10_000 },
    maxImageBytes: 1024,
  });
  return { ...ctx, app };
}

/**
 * Register, log in and return the bearer header value.
 */
export async function registerAndLogin(app: Express, username: string): Promise<string> {
  const email = `${username}@example.com`;
  await request(app)
    .post('/api/auth/register')
    .send({ username, email, password: 'password123' })
    .expect(201);
  const login = await request(app)
    .post('/api/auth/login')
    .send({ email, password: 'password123' })
    .expect(200);
  return `Bearer ${login.body.accessToken}`;
}
