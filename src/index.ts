export { config } from './shared/config/env';
export type { AppConfig, EnvConfig } from './shared/config/env';
export { AppError } from './shared/errors/app-error';
export type { ErrorCode } from './shared/errors/app-error';
export { logger, childLogger } from './shared/logging/logger';

export * from './core/swarm/swarm-types';
export { createQuery, MIN_QUESTION_CHARS } from './core/swarm/query';
export type { QueryInput } from './core/swarm/query';
export {
  PlanningError,
  RoleExecutionError,
  RoleTimeoutError,
  RoleUnavailableError,
  SynthesisError,
} from './core/swarm/swarmErrors';
export { QueryCancelledError, buildDegradedResult } from './core/swarm/agentExecutor';
export { planQuery } from './core/swarm/queryPlanner';
export { distributeTasks } from './core/swarm/taskDistributor';
export { executeTasks } from './core/swarm/executionStrategies';
export { synthesizeResults } from './core/swarm/resultSynthesizer';
export { validateConfidence } from './core/swarm/confidenceValidator';
export { buildRoleConfigs, withRoleOverrides } from './core/swarm/roleConfig';
export type { RoleConfig, RoleConfigOverride, RoleThresholds } from './core/swarm/roleConfig';
export type {
  CollaboratorOutput,
  RoleAvailability,
  RoleCapabilityTable,
  RoleCollaborator,
  RoleCollaboratorFactory,
  RoleInvocationHints,
  RoleStatus,
} from './core/swarm/roleCollaborator';
export type { QueryMetrics, QueryRecord } from './core/swarm/queryTracker';
export type { SwarmEvent, SwarmEventListener, SwarmEventType } from './core/swarm/swarm-events';
export { SwarmOrchestrator } from './core/swarm/swarmOrchestrator';
export type { SwarmOrchestratorOptions, SwarmStatus } from './core/swarm/swarmOrchestrator';
export { SwarmManager } from './core/swarm/swarmManager';
export type { AskOptions } from './core/swarm/swarmManager';
