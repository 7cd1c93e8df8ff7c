import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const csv = z
  .string()
  .optional()
  .default('')
  .transform(val => val.split(',').map(item => item.trim()).filter(item => item.length > 0));

const envSchema = z.object({
  SECRET_KEY: z.string({ required_error: 'SECRET_KEY environment variable is required' }).min(1, 'SECRET_KEY environment variable is required'),
  DEBUG: z.string().optional().default('False').transform(val => val.toLowerCase() === 'true'),
  APP_ENV: z.enum(['development', 'production']).optional().default('development'),
  ALLOWED_HOSTS: csv,
  ALLOWED_ORIGINS: csv,
  PORT: z.string().optional().default('8000').transform(val => Number(val) || 8000),
  SERVER_HOST: z.string().optional().default('0.0.0.0'),

  DB_NAME: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_HOST: z.string().optional().default('localhost'),
  DB_PORT: z.string().optional().default('5432').transform(val => Number(val) || 5432),

  MEDIA_ROOT: z.string().optional(),
  MEDIA_URL: z.string().optional().default('/media/'),

  CLOUD_RU_ACCESS_KEY_ID: z.string().optional().default(''),
  CLOUD_RU_SECRET_ACCESS_KEY: z.string().optional().default(''),
  CLOUD_RU_BUCKET_NAME: z.string().optional().default(''),
  CLOUD_RU_ENDPOINT_URL: z.string().optional().default(''),
  CLOUD_RU_REGION: z.string().optional().default('ru-1'),
});

export type StorageBackend = 'local' | 's3';

export type AppConfig = {
  secretKey: string;
  debug: boolean;
  env: 'development' | 'production';
  allowedHosts: string[];
  allowedOrigins: string[];
  port: number;
  host: string;
  database: {
    name?: string;
    user?: string;
    password?: string;
    host: string;
    port: number;
  };
  media: {
    root: string;
    url: string;
  };
  storage: {
    backend: StorageBackend;
    accessKeyId: string;
    secretAccessKey: string;
    bucket: string;
    endpoint: string;
    region: string;
  };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.parse(env);

  const hasBucketCredentials = Boolean(
    parsed.CLOUD_RU_ACCESS_KEY_ID && parsed.CLOUD_RU_SECRET_ACCESS_KEY && parsed.CLOUD_RU_BUCKET_NAME
  );
  // Development always keeps uploads on local disk.
  const backend: StorageBackend = parsed.APP_ENV === 'production' && hasBucketCredentials ? 's3' : 'local';

  return {
    secretKey: parsed.SECRET_KEY,
    debug: parsed.APP_ENV === 'development' ? true : parsed.DEBUG,
    env: parsed.APP_ENV,
    allowedHosts: parsed.ALLOWED_HOSTS,
    allowedOrigins: parsed.ALLOWED_ORIGINS,
    port: parsed.PORT,
    host: parsed.SERVER_HOST,
    database: {
      name: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
    },
    media: {
      root: parsed.MEDIA_ROOT ? path.resolve(parsed.MEDIA_ROOT) : path.join(process.cwd(), 'media'),
      url: parsed.MEDIA_URL.endsWith('/') ? parsed.MEDIA_URL : `${parsed.MEDIA_URL}/`,
    },
    storage: {
      backend,
      accessKeyId: parsed.CLOUD_RU_ACCESS_KEY_ID,
      secretAccessKey: parsed.CLOUD_RU_SECRET_ACCESS_KEY,
      bucket: parsed.CLOUD_RU_BUCKET_NAME,
      endpoint: parsed.CLOUD_RU_ENDPOINT_URL.replace(/\/+$/, ''),
      region: parsed.CLOUD_RU_REGION,
    },
  };
};

export const config = loadConfig();
