import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  STORAGE_BUCKET: z.string().min(1).default('allpdfs-bucket'),
  STORAGE_PUBLIC_BASE_URL: z.string().url().default('https://storage.googleapis.com'),
  STORAGE_UPLOAD_BASE_URL: z.string().url().default('https://storage.googleapis.com/upload/storage/v1'),
  STORAGE_ACCESS_TOKEN: z.string().optional(),
  VISION_ENDPOINT: z.string().url().default('https://vision.googleapis.com/v1/images:annotate'),
  VISION_API_KEY: z.string().optional(),
  API_KEY: z.string().optional(),
  RATE_LIMIT_MAX: z.coerce.number().default(100),
  RATE_LIMIT_WINDOW: z.coerce.number().default(60_000),
  CORS_ORIGINS: z.string().optional()
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('❌ Invalid environment configuration', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const corsOrigins =
  parsed.data.CORS_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean) ?? [];

export const config = {
  ...parsed.data,
  corsOrigins
};
