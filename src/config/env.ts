import { z } from 'zod';

/**
 * Parse a 'true'/'false' flag. z.coerce.boolean() treats any non-empty string
 * (including 'false') as true, so flags are parsed explicitly.
 */
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .catch(defaultValue ? 'true' : 'false')
    .transform((val) => val === 'true' || val === '1');

/**
 * Environment variable schema validation using Zod.
 *
 * The library is loaded into host processes whose environment it does not
 * own, so unknown values fall back to the defaults instead of failing.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development').catch('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info').catch('info'),

  // Pipeline
  PIPELINE_LOG_MODEL: booleanFlag(true), // log the resolved step order on build
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (parses on first use)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
