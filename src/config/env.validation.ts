import { z } from 'zod';

/**
 * Environment schema.
 *
 * TEMPERATURE_PLAUSIBILITY_THRESHOLD and the FEED_TITLE_* values are
 * heuristics, kept tunable rather than treated as domain constants.
 */
export const EnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  MAPPING_SOURCES_DIR: z.string().min(1).default('data/sources'),
  MAPPING_ARTIFACT_PATH: z
    .string()
    .min(1)
    .default('data/mapping/canonical-point-mapping.json'),
  TEMPERATURE_PLAUSIBILITY_THRESHOLD: z.coerce.number().positive().default(70),
  FEED_TITLE_MIN_LENGTH: z.coerce.number().int().nonnegative().default(10),
  FEED_TITLE_MIN_WORDS: z.coerce.number().int().positive().default(2),
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * `validate` hook for ConfigModule.forRoot
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}
