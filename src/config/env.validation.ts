import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive('PORT must be a positive integer').default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  SYNC_DATABASE: z.string().optional(),
  SWAGGER_PATH: z.string().min(1).default('docs'),
  // Empty secrets are allowed at boot; deliveries for that provider are then rejected.
  GITHUB_WEBHOOK_SECRET: z.string().default(''),
  GITLAB_WEBHOOK_TOKEN: z.string().default(''),
  BITBUCKET_WEBHOOK_SECRET: z.string().default(''),
  WEBHOOK_BODY_LIMIT: z.string().min(1).default('25mb'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * ConfigModule `validate` hook. Throws with the offending keys so the
 * process refuses to start on a bad environment.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    throw new Error(
      `Invalid configuration: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`,
    );
  }
  return parsed.data;
}
