import { limitConcurrency } from '../../../src/core/utils/concurrency';
import { RoleExecutionContext } from '../../../src/core/swarm/agentExecutor';
import { createQuery, QueryInput } from '../../../src/core/swarm/query';
import { CollaboratorOutput, RoleCapabilityTable, RoleCollaborator } from '../../../src/core/swarm/roleCollaborator';
import { buildRoleConfigs } from '../../../src/core/swarm/roleConfig';
import { AgentResult, Query, Role, ROLES } from '../../../src/core/swarm/swarm-types';

export const testRoleEnv = {
  SWARM_DEFAULT_MODEL: 'test-model',
  SWARM_DEFAULT_TIMEOUT_MS: 4000,
  SWARM_SOURCE_CREDIBILITY_THRESHOLD: 0.6,
  SWARM_MAX_SEARCH_RESULTS: 10,
  SWARM_HYPOTHESIS_GENERATION_ENABLED: true,
};

export function makeQuery(input: Partial<QueryInput> = {}): Query {
  return createQuery({
    question: 'How do superconductors expel magnetic fields?',
    complexity: 'basic',
    ...input,
  });
}

export function makeOutput(overrides: Partial<CollaboratorOutput> = {}): CollaboratorOutput {
  return {
    content: 'A neutral answer.',
    confidence: 0.7,
    sources: [],
    ...overrides,
  };
}

export function makeResult(role: Role, overrides: Partial<AgentResult> = {}): AgentResult {
  return {
    role,
    content: '',
    confidence: 0.7,
    confidenceLevel: 'medium',
    sources: [],
    reasoning: '',
    questionsRaised: [],
    metadata: {},
    processingMs: 10,
    timestamp: '2026-01-01T00:00:00.000Z',
    degraded: false,
    ...overrides,
  };
}

export function makeContext(
  query: Query,
  collaborators: Partial<Record<Role, RoleCollaborator>>,
  overrides: Partial<RoleExecutionContext> = {},
): RoleExecutionContext {
  return {
    query,
    collaborators,
    roleConfigs: buildRoleConfigs(testRoleEnv),
    substrate: limitConcurrency(4),
    ...overrides,
  };
}

export function capabilitiesFor(collaborators: Partial<Record<Role, RoleCollaborator>>): RoleCapabilityTable {
  const table: RoleCapabilityTable = {};
  for (const role of ROLES) {
    const collaborator = collaborators[role];
    if (collaborator) {
      table[role] = () => collaborator;
    }
  }
  return table;
}
