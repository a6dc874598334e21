import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),

  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  MONGODB_DB_NAME: z.string().min(1).default('inventorywise'),

  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  // Token lifetimes in seconds: 2 hours and 7 days
  JWT_EXPIRES_IN: z.coerce.number().int().positive().default(7200),
  JWT_REFRESH_EXPIRES_IN: z.coerce.number().int().positive().default(604800),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  SMTP_HOST: z.string().default('localhost'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  EMAIL_FROM: z.string().default('"InventoryWise" <no-reply@inventorywise.local>'),

  COMPANY_NAME: z.string().default('InventoryWise'),

  // Stock report delivery
  REPORT_CRON: z.string().default('0 8 * * *'),
  REPORT_JOB_ENABLED: booleanString('true'),
  REPORT_EMAIL_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  REPORT_EMAIL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(300000),

  CORS_ORIGINS: z.string().default('*')
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // The logger depends on env, so this one goes straight to stderr
  const errorMessage = `Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

export const env: Env = parsed.data;

export const corsOrigins = (): string[] | '*' => {
  if (env.CORS_ORIGINS.trim() === '*') {
    return '*';
  }
  return env.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
};
