import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('should apply defaults when only the secret is set', () => {
    const config = loadConfig({ JWT_SECRET: 'test-secret' });

    expect(config).toEqual({
      env: 'development',
      port: 3000,
      databaseUrl: undefined,
      jwt: { secret: 'test-secret', algorithm: 'HS256', expiresInMinutes: 30 },
      superadminEmail: undefined,
      logLevel: 'info',
      rateLimit: { perMinute: 60, loginPerMinute: 10 },
      imageStorage: null,
      maxImageBytes: 5 * 1024 * 1024,
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({
      JWT_SECRET: 'test-secret',
      PORT: '8080',
      ACCESS_TOKEN_EXPIRE_MINUTES: '15',
      RATE_LIMIT_PER_MINUTE: '120',
    });

    expect(config.port).toBe(8080);
    expect(config.jwt.expiresInMinutes).toBe(15);
    expect(config.rateLimit.perMinute).toBe(120);
  });

  it('should treat blank variables as unset', () => {
    const config = loadConfig({ JWT_SECRET: 'test-secret', SUPERADMIN_EMAIL: '', PORT: ' ' });

    expect(config.superadminEmail).toBeUndefined();
    expect(config.port).toBe(3000);
  });

  it('should fail without a JWT secret', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ JWT_SECRET: '' })).toThrow('JWT_SECRET is required');
  });

  it('should list every invalid variable', () => {
    try {
      loadConfig({ JWT_SECRET: 'test-secret', PORT: 'abc', SUPERADMIN_EMAIL: 'nope' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.map((issue) => issue.split(':')[0])).toEqual([
          'PORT',
          'SUPERADMIN_EMAIL',
        ]);
      }
    }
  });

  it('should enable image storage only when fully configured', () => {
    expect(
      loadConfig({ JWT_SECRET: 'test-secret', IMAGE_BUCKET: 'images' }).imageStorage
    ).toBeNull();

    const config = loadConfig({
      JWT_SECRET: 'test-secret',
      IMAGE_BUCKET: 'images',
      IMAGE_BUCKET_REGION: 'eu-west-1',
      IMAGE_PUBLIC_BASE_URL: 'https://cdn.example.com',
    });
    expect(config.imageStorage).toEqual({
      bucket: 'images',
      region: 'eu-west-1',
      publicBaseUrl: 'https://cdn.example.com',
      endpoint: undefined,
    });
  });
});
