import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

export const envSchema = z.object({
  PORT: z.coerce.number().default(8000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  FRONTEND_URL: z.string().url().optional(),

  // Ephemeral storage
  // Uploaded inputs and generated results live here; inputs are removed as soon as a run settles,
  // everything else is swept once it is older than RESULT_RETENTION_SECONDS.
  REPORTS_TEMP_DIR: z.string().min(1).default('temp'),
  RESULT_RETENTION_SECONDS: z.coerce.number().int().positive().default(3600),
  ARTIFACT_CLEANUP_CRON: z.string().default('*/10 * * * *'),
  MAX_UPLOAD_SIZE_MB: z.coerce.number().positive().default(20),

  // Feature Flags
  CRON_ENABLED: z.string().optional().default('true'),
  ENABLE_RATE_LIMIT: z.string().optional().default('true'),

  // Error reporting (disabled when unset)
  SENTRY_DSN: z.string().url().optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const config: AppConfig = parsed.data;
