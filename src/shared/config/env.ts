import dotenv from 'dotenv';
import { z } from 'zod';
import { AppError } from '../errors/app-error';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

const booleanFlagSchema = z.enum(['true', 'false']).transform((v) => v === 'true');

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'error',
  SWARM_NAME: 'test-swarm',
  SWARM_DEFAULT_MODEL: 'test-model',
  SWARM_DEFAULT_TIMEOUT_MS: '5000',
  SWARM_MAX_PARALLEL_ROLES: '4',
  SWARM_SOURCE_CREDIBILITY_THRESHOLD: '0.6',
  SWARM_MAX_SEARCH_RESULTS: '10',
  SWARM_HYPOTHESIS_GENERATION_ENABLED: 'true',
};

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  SWARM_NAME: z.string().min(1).default('research-swarm'),
  SWARM_DEFAULT_MODEL: z.string().min(1).default('gpt-4'),
  // Base for per-role timeouts; Master is scaled up and Search/Analysis down from it.
  SWARM_DEFAULT_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300_000).default(120_000),
  SWARM_MAX_PARALLEL_ROLES: z.coerce.number().int().min(1).max(10).default(4),
  SWARM_SOURCE_CREDIBILITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  SWARM_MAX_SEARCH_RESULTS: z.coerce.number().int().min(0).max(50).default(10),
  SWARM_HYPOTHESIS_GENERATION_ENABLED: booleanFlagSchema.default('true'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate a raw environment map against the swarm configuration schema.
 *
 * @throws AppError with code `CONFIG_INVALID` listing every offending key.
 */
export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError('CONFIG_INVALID', 'Invalid environment configuration', parsed.error, { issues });
  }
  return parsed.data;
}

const mergedEnv = {
  ...(isTestRuntime ? testDefaults : {}),
  ...process.env,
};

const parsedEnv = parseEnv(mergedEnv);

export const config = {
  ...parsedEnv,
  isDev: parsedEnv.NODE_ENV === 'development',
  isProd: parsedEnv.NODE_ENV === 'production',
};

export type AppConfig = typeof config;
