import { withTimeout } from '../../shared/async/resilience';
import { AppError } from '../../shared/errors/app-error';
import { childLogger } from '../../shared/logging/logger';
import { ConcurrencyLimiter } from '../utils/concurrency';
import { collaboratorOutputSchema, RoleCollaborator } from './roleCollaborator';
import { RoleConfig } from './roleConfig';
import {
  RoleExecutionError,
  RoleTimeoutError,
  RoleUnavailableError,
  toRoleFailure,
} from './swarmErrors';
import {
  AgentResult,
  buildSourceRecord,
  clamp01,
  confidenceLevelFromScore,
  Query,
  Role,
  RoleResultMap,
  RoleTask,
} from './swarm-types';

const log = childLogger({ component: 'agent-executor' });

export interface RoleExecutionContext {
  query: Query;
  collaborators: Partial<Record<Role, RoleCollaborator>>;
  roleConfigs: Record<Role, RoleConfig>;
  /** Limiter shared across queries; the full-orchestration strategy schedules its batch through it. */
  substrate: ConcurrencyLimiter;
  isCancelled?: () => boolean;
  onRoleSettled?: (result: AgentResult) => void;
}

export class QueryCancelledError extends AppError {
  constructor(queryId: string) {
    super('QUERY_CANCELLED', `Query "${queryId}" was cancelled`, undefined, { queryId });
    this.name = 'QueryCancelledError';
  }
}

export function ensureActive(ctx: RoleExecutionContext): void {
  if (ctx.isCancelled?.()) {
    throw new QueryCancelledError(ctx.query.id);
  }
}

/** Role deadline capped by the query's own time limit. */
export function effectiveTimeoutMs(roleTimeoutMs: number, timeLimitSec: number): number {
  return Math.max(1, Math.floor(Math.min(roleTimeoutMs, timeLimitSec * 1000)));
}

function freezeResult(result: AgentResult): AgentResult {
  return Object.freeze({
    ...result,
    sources: Object.freeze([...result.sources]),
    questionsRaised: Object.freeze([...result.questionsRaised]),
    metadata: Object.freeze({ ...result.metadata }),
  });
}

/**
 * The single substitute shape for a role that could not answer: LOW confidence, no sources,
 * the failure recorded in metadata.
 */
export function buildDegradedResult(role: Role, failure: AppError, processingMs = 0): AgentResult {
  return freezeResult({
    role,
    content: `The ${role} role could not contribute: ${failure.message}`,
    confidence: 0,
    confidenceLevel: 'low',
    sources: [],
    reasoning: `Degraded result after ${failure.code}`,
    questionsRaised: [],
    metadata: {
      degraded: true,
      error: { code: failure.code, message: failure.message },
    },
    processingMs: Math.max(0, processingMs),
    timestamp: new Date().toISOString(),
    degraded: true,
  });
}

export function normalizeCollaboratorOutput(role: Role, raw: unknown, elapsedMs: number): AgentResult {
  const parsed = collaboratorOutputSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new RoleExecutionError(role, `Role "${role}" returned a malformed result (${issues.join('; ')})`, parsed.error);
  }

  const output = parsed.data;
  const confidence = clamp01(output.confidence);
  return freezeResult({
    role,
    content: output.content,
    confidence,
    confidenceLevel: confidenceLevelFromScore(confidence),
    sources: output.sources.map((source) => buildSourceRecord(source)),
    reasoning: output.reasoning,
    questionsRaised: output.questionsRaised,
    metadata: output.metadata,
    processingMs: output.processingMs ?? Math.max(0, elapsedMs),
    timestamp: new Date().toISOString(),
    degraded: false,
  });
}

async function invokeRole(task: RoleTask, ctx: RoleExecutionContext, peerResults: RoleResultMap): Promise<AgentResult> {
  const collaborator = ctx.collaborators[task.role];
  if (!collaborator) {
    throw new RoleUnavailableError(task.role, `Role "${task.role}" is not available`);
  }

  const timeoutMs = effectiveTimeoutMs(ctx.roleConfigs[task.role].timeoutMs, ctx.query.timeLimitSec);
  const startedAt = Date.now();
  const output = await withTimeout(
    collaborator.processQuery(ctx.query, {
      priority: task.priority,
      hints: task.hints,
      peerResults: Object.freeze({ ...peerResults }),
    }),
    timeoutMs,
    `role:${task.role}`,
    { onTimeout: (ms) => new RoleTimeoutError(task.role, ms) },
  );
  return normalizeCollaboratorOutput(task.role, output, Date.now() - startedAt);
}

/**
 * Run one role task. Non-Master failures come back as a degraded result; a Master failure
 * is raised because the query cannot complete without it.
 */
export async function runRoleTask(
  task: RoleTask,
  ctx: RoleExecutionContext,
  peerResults: RoleResultMap = {},
): Promise<AgentResult> {
  const startedAt = Date.now();
  let result: AgentResult;
  try {
    result = await invokeRole(task, ctx, peerResults);
    log.debug(
      { queryId: ctx.query.id, role: task.role, latencyMs: Date.now() - startedAt, confidence: result.confidence },
      'Role task completed',
    );
  } catch (error) {
    const failure = toRoleFailure(task.role, error);
    if (task.role === 'master') {
      log.error({ queryId: ctx.query.id, role: task.role, code: failure.code, error: failure.message }, 'Master role failed');
      throw failure;
    }
    log.warn(
      { queryId: ctx.query.id, role: task.role, code: failure.code, error: failure.message },
      'Role task failed; using degraded result',
    );
    result = buildDegradedResult(task.role, failure, Date.now() - startedAt);
  }

  ctx.onRoleSettled?.(result);
  return result;
}
