import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Unset and blank variables are treated the same
const blankAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankAsUndefined, z.string().trim().optional());

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(3000)),
  DATABASE_URL: optionalText,
  JWT_SECRET: z.preprocess(
    blankAsUndefined,
    z.string({ required_error: 'JWT_SECRET is required' })
  ),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(30)
  ),
  SUPERADMIN_EMAIL: z.preprocess(blankAsUndefined, z.string().email().optional()),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  RATE_LIMIT_PER_MINUTE: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(60)
  ),
  LOGIN_RATE_LIMIT_PER_MINUTE: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(10)
  ),
  IMAGE_BUCKET: optionalText,
  IMAGE_BUCKET_REGION: optionalText,
  IMAGE_PUBLIC_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  S3_ENDPOINT: z.preprocess(blankAsUndefined, z.string().url().optional()),
  MAX_IMAGE_BYTES: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(5 * 1024 * 1024)
  ),
});

export type RawConfig = z.infer<typeof configSchema>;

export interface ImageStorageConfig {
  bucket: string;
  region: string;
  publicBaseUrl: string;
  endpoint?: string;
}

export interface AppConfig {
  env: RawConfig['NODE_ENV'];
  port: number;
  databaseUrl?: string;
  jwt: {
    secret: string;
    algorithm: RawConfig['JWT_ALGORITHM'];
    expiresInMinutes: number;
  };
  superadminEmail?: string;
  logLevel: RawConfig['LOG_LEVEL'];
  rateLimit: {
    perMinute: number;
    loginPerMinute: number;
  };
  /** Null unless bucket, region and public URL are all set. */
  imageStorage: ImageStorageConfig | null;
  maxImageBytes: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const raw = result.data;

  const imageStorage =
    raw.IMAGE_BUCKET && raw.IMAGE_BUCKET_REGION && raw.IMAGE_PUBLIC_BASE_URL
      ? {
          bucket: raw.IMAGE_BUCKET,
          region: raw.IMAGE_BUCKET_REGION,
          publicBaseUrl: raw.IMAGE_PUBLIC_BASE_URL,
          endpoint: raw.S3_ENDPOINT,
        }
      : null;

  return {
    env: raw.NODE_ENV,
    port: raw.PORT,
    databaseUrl: raw.DATABASE_URL,
    jwt: {
      secret: raw.JWT_SECRET,
      algorithm: raw.JWT_ALGORITHM,
      expiresInMinutes: raw.ACCESS_TOKEN_EXPIRE_MINUTES,
    },
    superadminEmail: raw.SUPERADMIN_EMAIL,
    logLevel: raw.LOG_LEVEL,
    rateLimit: {
      perMinute: raw.RATE_LIMIT_PER_MINUTE,
      loginPerMinute: raw.LOGIN_RATE_LIMIT_PER_MINUTE,
    },
    imageStorage,
    maxImageBytes: raw.MAX_IMAGE_BYTES,
  };
}
