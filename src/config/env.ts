import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const envSchema = z.object({
  CONFIG_FILE: z.string().min(1, 'CONFIG_FILE must not be empty').optional().default('config.yaml'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional().default('info'),
  NOTIFIER_PROVIDER: z.enum(['twilio', 'console']).optional().default('twilio'),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const details = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid environment configuration: ${details}`);
}

export const env = Object.freeze(parsed.data);

export type EnvConfig = typeof env;
