import { describe, expect, it } from 'vitest';
import { config, parseEnv } from '../../../src/shared/config/env';
import { AppError } from '../../../src/shared/errors/app-error';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseEnv', () => {
  it('fills defaults for an empty environment', () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      SWARM_NAME: 'research-swarm',
      SWARM_DEFAULT_MODEL: 'gpt-4',
      SWARM_DEFAULT_TIMEOUT_MS: 120_000,
      SWARM_MAX_PARALLEL_ROLES: 4,
      SWARM_SOURCE_CREDIBILITY_THRESHOLD: 0.6,
      SWARM_MAX_SEARCH_RESULTS: 10,
      SWARM_HYPOTHESIS_GENERATION_ENABLED: true,
    });
  });

  it('coerces numeric strings and boolean flags', () => {
    const env = parseEnv({
      SWARM_DEFAULT_TIMEOUT_MS: '30000',
      SWARM_MAX_PARALLEL_ROLES: '2',
      SWARM_HYPOTHESIS_GENERATION_ENABLED: 'false',
    });

    expect(env.SWARM_DEFAULT_TIMEOUT_MS).toBe(30_000);
    expect(env.SWARM_MAX_PARALLEL_ROLES).toBe(2);
    expect(env.SWARM_HYPOTHESIS_GENERATION_ENABLED).toBe(false);
  });

  it('throws CONFIG_INVALID naming each offending key', () => {
    const error = captureError(() =>
      parseEnv({ SWARM_DEFAULT_TIMEOUT_MS: '500', SWARM_HYPOTHESIS_GENERATION_ENABLED: 'yes' }),
    );

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: 'CONFIG_INVALID', message: 'Invalid environment configuration' });
    expect(error).toMatchObject({
      details: {
        issues: [
          expect.stringMatching(/^SWARM_DEFAULT_TIMEOUT_MS: /),
          expect.stringMatching(/^SWARM_HYPOTHESIS_GENERATION_ENABLED: /),
        ],
      },
    });
  });

  it('rejects a parallelism bound above ten', () => {
    expect(() => parseEnv({ SWARM_MAX_PARALLEL_ROLES: '11' })).toThrow(AppError);
  });
});

describe('config', () => {
  it('loads the test runtime configuration', () => {
    expect(config.NODE_ENV).toBe('test');
    expect(config.isDev).toBe(false);
    expect(config.isProd).toBe(false);
  });
});
