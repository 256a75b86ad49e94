import { getEnv, parseEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

/**
 * Library configuration derived from environment
 */
export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logging: {
    level: string;
  };
  pipeline: {
    logModel: boolean;
  };
}

/**
 * Build configuration from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    env: env.NODE_ENV,
    logging: {
      level: env.LOG_LEVEL,
    },
    pipeline: {
      logModel: env.PIPELINE_LOG_MODEL,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
