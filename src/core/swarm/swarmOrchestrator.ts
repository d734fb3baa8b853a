import { config } from '../../shared/config/env';
import { AppError, toErrorWithCode } from '../../shared/errors/app-error';
import { childLogger } from '../../shared/logging/logger';
import { ConcurrencyLimiter, limitConcurrency } from '../utils/concurrency';
import { buildDegradedResult, QueryCancelledError, RoleExecutionContext } from './agentExecutor';
import { validateConfidence } from './confidenceValidator';
import { executeTasks } from './executionStrategies';
import { isTerminalStatus, QueryRecord, QueryTracker } from './queryTracker';
import { planQuery } from './queryPlanner';
import { emptySynthesis, synthesizeResults } from './resultSynthesizer';
import { RoleCapabilityTable, RoleRegistry, RoleStatus } from './roleCollaborator';
import { buildRoleConfigs, RoleConfig, RoleConfigOverride, withRoleOverrides } from './roleConfig';
import { createSwarmEventFactory, SwarmEventBus, SwarmEventFactory, SwarmEventListener } from './swarm-events';
import { RoleUnavailableError } from './swarmErrors';
import { distributeTasks } from './taskDistributor';
import { AgentResult, Query, QueryStatus, Role, RoleResultMap, ROLES, SwarmResult, TerminalStatus } from './swarm-types';

const log = childLogger({ component: 'swarm-orchestrator' });

export interface SwarmOrchestratorOptions {
  capabilities: RoleCapabilityTable;
  roleConfigs?: Record<Role, RoleConfig>;
  roleOverrides?: Partial<Record<Role, RoleConfigOverride>>;
  /** Size of the shared substrate used by the full-orchestration strategy. */
  maxParallelRoles?: number;
}

export interface SwarmStatus {
  roles: Record<Role, RoleStatus>;
  activeQueryCount: number;
  totalProcessed: number;
  averageProcessingMs: number;
}

function rolesIn(results: RoleResultMap): Role[] {
  return ROLES.filter((role) => results[role] !== undefined);
}

/**
 * Drives each query through planning, distribution, execution, synthesis and validation.
 * Queries are independent; the only shared state is the tracking store and the substrate.
 */
export class SwarmOrchestrator {
  private readonly registry: RoleRegistry;
  private readonly roleConfigs: Record<Role, RoleConfig>;
  private readonly tracker = new QueryTracker();
  private readonly events = new SwarmEventBus();
  private readonly emitters = new Map<string, SwarmEventFactory>();
  private readonly substrate: ConcurrencyLimiter;
  private initialization: Promise<Partial<Record<Role, RoleUnavailableError>>> | null = null;
  private closed = false;

  constructor(opts: SwarmOrchestratorOptions) {
    this.roleConfigs = withRoleOverrides(opts.roleConfigs ?? buildRoleConfigs(), opts.roleOverrides);
    this.registry = new RoleRegistry(opts.capabilities, this.roleConfigs);
    this.substrate = limitConcurrency(opts.maxParallelRoles ?? config.SWARM_MAX_PARALLEL_ROLES);
  }

  /**
   * Initialise every configured role once. Later calls share the first attempt.
   *
   * @returns Roles that could not be initialised, keyed by role.
   */
  initialize(): Promise<Partial<Record<Role, RoleUnavailableError>>> {
    if (!this.initialization) {
      this.initialization = this.registry.initializeAll().then((failures) => {
        const failed = Object.keys(failures);
        if (failed.length > 0) {
          log.warn({ roles: failed }, 'Some roles failed to initialise');
        } else {
          log.info({ roles: ROLES.filter((role) => this.registry.isReady(role)) }, 'Swarm roles initialised');
        }
        return failures;
      });
    }
    return this.initialization;
  }

  onEvent(listener: SwarmEventListener): () => void {
    return this.events.subscribe(listener);
  }

  getStatus(): SwarmStatus {
    return {
      roles: this.registry.status(),
      activeQueryCount: this.tracker.activeCount(),
      totalProcessed: this.tracker.totalProcessed(),
      averageProcessingMs: this.tracker.averageProcessingMs(),
    };
  }

  getQueryRecord(queryId: string): QueryRecord | undefined {
    return this.tracker.get(queryId);
  }

  /**
   * Request cooperative cancellation. In-flight role calls keep running; their results are
   * discarded when they return.
   *
   * @returns false when the query is unknown or already finished.
   */
  cancelQuery(queryId: string): boolean {
    const status = this.tracker.status(queryId);
    const emitter = this.emitters.get(queryId);
    if (status === undefined || isTerminalStatus(status) || !emitter) {
      return false;
    }
    this.tracker.transition(queryId, 'cancelled');
    this.events.emit(emitter.nextEvent({ type: 'state_changed', status: 'cancelled', previousStatus: status }));
    log.info({ queryId, previousStatus: status }, 'Query cancellation requested');
    return true;
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    for (const queryId of this.tracker.activeIds()) {
      this.cancelQuery(queryId);
    }
    await this.registry.cleanupAll();
    log.info({ totalProcessed: this.tracker.totalProcessed() }, 'Swarm orchestrator shut down');
  }

  /**
   * Run a query to a terminal result. Never rejects: planning, Master and synthesis failures
   * come back as a failed result, cancellation as a cancelled one.
   */
  async submitQuery(query: Query): Promise<SwarmResult> {
    const startedAt = Date.now();
    const emitter = createSwarmEventFactory(query.id);

    if (this.closed) {
      return this.untrackedResult(query, new QueryCancelledError(query.id), 'cancelled', startedAt);
    }
    try {
      this.tracker.register(query.id, new Date(startedAt));
    } catch (error) {
      return this.untrackedResult(query, toErrorWithCode(error, 'INVALID_STATE_TRANSITION'), 'failed', startedAt);
    }
    this.emitters.set(query.id, emitter);
    this.events.emit(emitter.nextEvent({ type: 'query_queued', status: 'queued' }));
    log.info({ queryId: query.id, complexity: query.complexity }, 'Query submitted');

    const collected: RoleResultMap = {};
    try {
      return await this.runPipeline(query, emitter, collected, startedAt);
    } catch (error) {
      return this.finishUnsuccessfully(query, error, collected, emitter, startedAt);
    } finally {
      this.emitters.delete(query.id);
    }
  }

  private async runPipeline(
    query: Query,
    emitter: SwarmEventFactory,
    collected: RoleResultMap,
    startedAt: number,
  ): Promise<SwarmResult> {
    this.advance(query.id, 'planning', emitter);
    const plan = planQuery(query);
    this.tracker.attachPlan(query.id, plan);
    log.debug(
      { queryId: query.id, queryType: plan.queryType, strategy: plan.strategy, roles: [...plan.requiredRoles] },
      'Query planned',
    );

    this.advance(query.id, 'distributing', emitter);
    const tasks = distributeTasks(query, plan);
    await this.initialize();
    await this.ensureMasterReady(query.id);

    this.advance(query.id, 'executing', emitter);
    const isCancelled = () => this.tracker.status(query.id) === 'cancelled';
    const ctx: RoleExecutionContext = {
      query,
      collaborators: this.registry.readyCollaborators(),
      roleConfigs: this.roleConfigs,
      substrate: this.substrate,
      isCancelled,
      onRoleSettled: (result) => {
        if (isCancelled()) return;
        collected[result.role] = result;
        this.events.emit(
          emitter.nextEvent({
            type: 'role_completed',
            role: result.role,
            confidence: result.confidenceLevel,
            details: { degraded: result.degraded, processingMs: result.processingMs },
          }),
        );
      },
    };
    const results = await executeTasks(plan.strategy, tasks, ctx);

    this.advance(query.id, 'synthesizing', emitter);
    const synthesis = synthesizeResults({ results, question: query.question });

    this.advance(query.id, 'validating', emitter);
    const assessment = validateConfidence({
      synthesis,
      results,
      criteria: plan.successCriteria,
      requiredConfidence: query.requiredConfidence,
    });

    const master = results.master;
    if (!master) {
      throw new RoleUnavailableError('master', 'Master role produced no result');
    }

    this.advance(query.id, 'completed', emitter);
    const durationMs = Date.now() - startedAt;
    const rolesUsed = rolesIn(results);
    this.tracker.finish(query.id, {
      durationMs,
      metrics: {
        complexity: query.complexity,
        durationMs,
        rolesUsed,
        sourcesFound: synthesis.unifiedSources.length,
        confidence: assessment.level,
      },
    });
    this.events.emit(
      emitter.nextEvent({
        type: 'query_finished',
        status: 'completed',
        confidence: assessment.level,
        details: { durationMs },
      }),
    );
    log.info(
      { queryId: query.id, durationMs, confidence: assessment.level, score: assessment.score, rolesUsed },
      'Query completed',
    );

    return {
      queryId: query.id,
      query,
      master,
      results,
      synthesis,
      confidence: assessment.level,
      assessment,
      durationMs,
      timestamp: new Date().toISOString(),
      status: 'completed',
    };
  }

  /** A single best-effort re-attempt for a Master that has never initialised. */
  private async ensureMasterReady(queryId: string): Promise<void> {
    if (this.registry.isReady('master')) return;
    try {
      await this.registry.initializeRole('master');
    } catch (error) {
      log.warn({ queryId, error }, 'Master re-initialisation failed');
      const cause = error instanceof AppError && error.cause !== undefined ? error.cause : error;
      throw new RoleUnavailableError('master', 'Master role is unavailable', cause);
    }
  }

  /** Move to the next state unless the query was cancelled in the meantime. */
  private advance(queryId: string, next: QueryStatus, emitter: SwarmEventFactory): void {
    if (this.tracker.status(queryId) === 'cancelled') {
      throw new QueryCancelledError(queryId);
    }
    const previousStatus = this.tracker.transition(queryId, next);
    this.events.emit(emitter.nextEvent({ type: 'state_changed', status: next, previousStatus }));
  }

  private finishUnsuccessfully(
    query: Query,
    error: unknown,
    collected: RoleResultMap,
    emitter: SwarmEventFactory,
    startedAt: number,
  ): SwarmResult {
    const cancelled = error instanceof QueryCancelledError || this.tracker.status(query.id) === 'cancelled';
    const failure = cancelled ? new QueryCancelledError(query.id) : toErrorWithCode(error, 'INTERNAL_ERROR');
    const status: TerminalStatus = cancelled ? 'cancelled' : 'failed';

    const current = this.tracker.status(query.id);
    if (!cancelled && current !== undefined && !isTerminalStatus(current)) {
      const previousStatus = this.tracker.transition(query.id, 'failed');
      this.events.emit(emitter.nextEvent({ type: 'state_changed', status: 'failed', previousStatus }));
    }

    const result = this.terminalResult(query, failure, status, { ...collected }, startedAt);
    this.tracker.finish(query.id, { durationMs: result.durationMs, error: result.error });
    this.events.emit(
      emitter.nextEvent({
        type: 'query_finished',
        status,
        confidence: 'low',
        details: { code: failure.code, durationMs: result.durationMs },
      }),
    );

    if (cancelled) {
      log.info({ queryId: query.id, durationMs: result.durationMs }, 'Query cancelled');
    } else {
      log.error({ queryId: query.id, code: failure.code, error: failure }, 'Query failed');
    }
    return result;
  }

  private untrackedResult(query: Query, failure: AppError, status: TerminalStatus, startedAt: number): SwarmResult {
    log.warn({ queryId: query.id, code: failure.code, error: failure.message }, 'Query rejected before tracking');
    return this.terminalResult(query, failure, status, {}, startedAt);
  }

  private terminalResult(
    query: Query,
    failure: AppError,
    status: TerminalStatus,
    results: RoleResultMap,
    startedAt: number,
  ): SwarmResult {
    const master: AgentResult = results.master ?? buildDegradedResult('master', failure);
    return {
      queryId: query.id,
      query,
      master,
      results,
      synthesis: emptySynthesis(),
      confidence: 'low',
      assessment: null,
      durationMs: Date.now() - startedAt,
      timestamp: new Date().toISOString(),
      status,
      error: { code: failure.code, message: failure.message },
    };
  }
}
