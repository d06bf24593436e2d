import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: z.string().default(''),
  REDIS_URL: z.string().default(''),
  LIST_CACHE_KEY: z.string().min(1).default('salonsvc:services:list'),
  LIST_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = {
  env: 'development' | 'test' | 'production';
  port: number;
  databaseUrl: string;
  redisUrl: string;
  listCacheKey: string;
  listCacheTtlSeconds: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    // Keys only: values may hold credentials.
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid environment configuration: ${keys}`);
  }

  return {
    env: parsed.data.NODE_ENV,
    port: parsed.data.PORT,
    databaseUrl: parsed.data.DATABASE_URL.trim(),
    redisUrl: parsed.data.REDIS_URL.trim(),
    listCacheKey: parsed.data.LIST_CACHE_KEY,
    listCacheTtlSeconds: parsed.data.LIST_CACHE_TTL_SECONDS,
    logLevel: parsed.data.LOG_LEVEL,
  };
}

const mediaHostSchema = z.object({
  CLOUDINARY_CLOUD_NAME: z.string().min(1),
  CLOUDINARY_API_KEY: z.string().min(1),
  CLOUDINARY_API_SECRET: z.string().min(1),
});

export type MediaHostConfig = {
  cloudName: string;
  apiKey: string;
  apiSecret: string;
};

/**
 * Media host credentials are read on every call rather than at startup, so a
 * rotated secret takes effect without a restart.
 */
export function readMediaHostConfig(env: NodeJS.ProcessEnv = process.env): MediaHostConfig {
  const parsed = mediaHostSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`media host is not configured: missing ${keys}`);
  }
  return {
    cloudName: parsed.data.CLOUDINARY_CLOUD_NAME,
    apiKey: parsed.data.CLOUDINARY_API_KEY,
    apiSecret: parsed.data.CLOUDINARY_API_SECRET,
  };
}
