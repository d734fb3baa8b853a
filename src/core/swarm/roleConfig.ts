import { config as appConfig, EnvConfig } from '../../shared/config/env';
import { Role, ROLES } from './swarm-types';

export interface RoleThresholds {
  /** Minimum credibility a source must reach to be reported. */
  sourceCredibility: number;
  maxSearchResults: number;
  hypothesisGeneration: boolean;
}

export interface RoleConfig {
  role: Role;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  retryAttempts: number;
  thresholds: RoleThresholds;
}

type RoleConfigEnv = Pick<
  EnvConfig,
  | 'SWARM_DEFAULT_MODEL'
  | 'SWARM_DEFAULT_TIMEOUT_MS'
  | 'SWARM_SOURCE_CREDIBILITY_THRESHOLD'
  | 'SWARM_MAX_SEARCH_RESULTS'
  | 'SWARM_HYPOTHESIS_GENERATION_ENABLED'
>;

function scaleTimeout(baseMs: number, factor: number): number {
  return Math.max(1, Math.round(baseMs * factor));
}

/**
 * Per-role defaults. Search and Analysis run on shorter deadlines, Master on a longer one
 * because it waits on peer output in the hierarchical strategies.
 */
export function buildRoleConfigs(env: RoleConfigEnv = appConfig): Record<Role, RoleConfig> {
  const base = env.SWARM_DEFAULT_TIMEOUT_MS;
  const credibility = env.SWARM_SOURCE_CREDIBILITY_THRESHOLD;

  return {
    master: {
      role: 'master',
      model: env.SWARM_DEFAULT_MODEL,
      temperature: 0.5,
      maxTokens: 3000,
      timeoutMs: scaleTimeout(base, 1.5),
      retryAttempts: 3,
      thresholds: {
        sourceCredibility: credibility,
        maxSearchResults: 5,
        hypothesisGeneration: env.SWARM_HYPOTHESIS_GENERATION_ENABLED,
      },
    },
    search: {
      role: 'search',
      model: env.SWARM_DEFAULT_MODEL,
      temperature: 0.3,
      maxTokens: 1500,
      timeoutMs: scaleTimeout(base, 0.75),
      retryAttempts: 3,
      thresholds: {
        sourceCredibility: credibility,
        maxSearchResults: env.SWARM_MAX_SEARCH_RESULTS,
        hypothesisGeneration: false,
      },
    },
    innovation: {
      role: 'innovation',
      model: env.SWARM_DEFAULT_MODEL,
      temperature: 0.8,
      maxTokens: 2500,
      timeoutMs: base,
      retryAttempts: 2,
      thresholds: {
        sourceCredibility: 0.4,
        maxSearchResults: 3,
        hypothesisGeneration: true,
      },
    },
    analysis: {
      role: 'analysis',
      model: env.SWARM_DEFAULT_MODEL,
      temperature: 0.7,
      maxTokens: 1000,
      timeoutMs: scaleTimeout(base, 0.75),
      retryAttempts: 2,
      thresholds: {
        sourceCredibility: credibility,
        maxSearchResults: 0,
        hypothesisGeneration: false,
      },
    },
  };
}

export type RoleConfigOverride = Partial<Omit<RoleConfig, 'role' | 'thresholds'>> & {
  thresholds?: Partial<RoleThresholds>;
};

export function withRoleOverrides(
  configs: Record<Role, RoleConfig>,
  overrides: Partial<Record<Role, RoleConfigOverride>> = {},
): Record<Role, RoleConfig> {
  const merged = { ...configs };
  for (const role of ROLES) {
    const override = overrides[role];
    if (!override) continue;
    merged[role] = {
      ...configs[role],
      ...override,
      thresholds: { ...configs[role].thresholds, ...override.thresholds },
      role,
    };
  }
  return merged;
}
