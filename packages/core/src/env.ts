import path from 'node:path';
import { z } from 'zod';

import { FatalConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Ensures configuration is well-formed at boot time
 */

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: LogLevelSchema.default('info'),
  SERVICE_NAME: z.string().min(1).default('avf-risk'),
  /** Directory holding the model artifacts; searched before the defaults */
  AVF_MODEL_DIR: z
    .string()
    .optional()
    .transform((v) => (v?.trim() ? v.trim() : undefined)),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Artifact directories searched, relative to the working directory, after
 * AVF_MODEL_DIR
 */
export const DEFAULT_ARTIFACT_DIRS = Object.freeze(['Models', path.join('..', 'Models')]);

/**
 * Validate environment variables
 * @param source - Variables to validate (defaults to process.env)
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors).map(
      ([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`
    );

    throw new FatalConfigurationError(
      `Environment validation failed:\n  ${errorMessages.join('\n  ')}`,
      { source: 'environment', details: errorMessages }
    );
  }

  return result.data;
}

/**
 * Get validated env with type safety
 */
export function getEnv(): Env {
  return validateEnv(process.env);
}

/**
 * Candidate artifact directories in search order
 */
export function getArtifactSearchPaths(env: Pick<Env, 'AVF_MODEL_DIR'>): string[] {
  return env.AVF_MODEL_DIR
    ? [env.AVF_MODEL_DIR, ...DEFAULT_ARTIFACT_DIRS]
    : [...DEFAULT_ARTIFACT_DIRS];
}
