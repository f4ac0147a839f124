import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';

// Load .env.local first if it exists, then .env
const envLocalPath = join(process.cwd(), '.env.local');
const envPath = join(process.cwd(), '.env');

if (existsSync(envLocalPath)) {
  dotenv.config({ path: envLocalPath });
} else if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
} else {
  dotenv.config();
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),

  // Database (Postgres connection string of the managed store)
  DATABASE_URL: z.string().url(),

  // Resend mail API
  RESEND_API_KEY: z.string().min(1, 'RESEND_API_KEY is required'),
  RESEND_FROM_EMAIL: z.string().email('RESEND_FROM_EMAIL must be an email address'),
  RESEND_FROM_NAME: z.string().default('Reminder System'),
  RESEND_API_URL: z.string().url().default('https://api.resend.com'),

  // Dispatch
  EMAIL_BATCH_SIZE: z.string().default('100').transform(Number).pipe(z.number().int().min(1).max(100)),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

export type Env = z.infer<typeof envSchema>;
