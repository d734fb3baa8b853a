import { childLogger } from '../../shared/logging/logger';
import { limitConcurrency } from '../utils/concurrency';
import { buildDegradedResult, ensureActive, RoleExecutionContext, runRoleTask } from './agentExecutor';
import { toRoleFailure } from './swarmErrors';
import { AgentResult, ExecutionStrategy, Role, RoleResultMap, RoleTask } from './swarm-types';

const log = childLogger({ component: 'execution-strategies' });

export type StrategyRunner = (tasks: RoleTask[], ctx: RoleExecutionContext) => Promise<RoleResultMap>;

function byPriority(tasks: RoleTask[]): RoleTask[] {
  return [...tasks].sort((a, b) => a.priority - b.priority);
}

function findTask(tasks: RoleTask[], role: Role): RoleTask | undefined {
  return tasks.find((task) => task.role === role);
}

/**
 * Fan out non-Master tasks and wait for all of them. A rejected peer (which runRoleTask
 * only produces on an internal fault) still yields a degraded result for its role.
 */
async function fanOut(
  tasks: RoleTask[],
  ctx: RoleExecutionContext,
  peerResults: RoleResultMap,
): Promise<AgentResult[]> {
  if (tasks.length === 0) return [];
  const limiter = limitConcurrency(tasks.length);
  const settled = await Promise.allSettled(
    tasks.map((task) => limiter(() => runRoleTask(task, ctx, peerResults))),
  );
  return settled.map((outcome, idx) => {
    if (outcome.status === 'fulfilled') return outcome.value;
    const role = tasks[idx].role;
    return buildDegradedResult(role, toRoleFailure(role, outcome.reason));
  });
}

function collect(results: AgentResult[], into: RoleResultMap = {}): RoleResultMap {
  for (const result of results) {
    into[result.role] = result;
  }
  return into;
}

export const runSequential: StrategyRunner = async (tasks, ctx) => {
  const results: RoleResultMap = {};
  for (const task of byPriority(tasks)) {
    ensureActive(ctx);
    results[task.role] = await runRoleTask(task, ctx);
  }
  return results;
};

export const runParallel: StrategyRunner = async (tasks, ctx) => {
  const peers = tasks.filter((task) => task.role !== 'master');
  const results = collect(await fanOut(peers, ctx, {}));

  const master = findTask(tasks, 'master');
  if (master) {
    ensureActive(ctx);
    results.master = await runRoleTask(master, ctx);
  }
  return results;
};

/**
 * Search first, then Innovation and Analysis side by side with the Search result, then
 * Master with every peer result. Roles already present in `prior` are not run again.
 */
export async function runHierarchicalFrom(
  tasks: RoleTask[],
  ctx: RoleExecutionContext,
  prior: RoleResultMap = {},
): Promise<RoleResultMap> {
  const results: RoleResultMap = { ...prior };
  const pending = (role: Role) => (results[role] ? undefined : findTask(tasks, role));

  const search = pending('search');
  if (search) {
    ensureActive(ctx);
    results.search = await runRoleTask(search, ctx);
  }

  const phaseTwo = (['innovation', 'analysis'] as const)
    .map((role) => pending(role))
    .filter((task): task is RoleTask => task !== undefined);
  if (phaseTwo.length > 0) {
    ensureActive(ctx);
    const researchContext: RoleResultMap = results.search ? { search: results.search } : {};
    collect(await fanOut(phaseTwo, ctx, researchContext), results);
  }

  const master = pending('master');
  if (master) {
    ensureActive(ctx);
    results.master = await runRoleTask(master, ctx, { ...results });
  }
  return results;
}

export const runHierarchical: StrategyRunner = (tasks, ctx) => runHierarchicalFrom(tasks, ctx);

/**
 * Every role, Master included, as one batch on the shared substrate. If any part of the batch
 * is rejected the query falls back to the hierarchical strategy; results that did settle are
 * kept and only the missing roles run again.
 */
export const runFullOrchestration: StrategyRunner = async (tasks, ctx) => {
  ensureActive(ctx);
  const outcomes = await Promise.allSettled(tasks.map((task) => ctx.substrate(() => runRoleTask(task, ctx))));

  const settled: RoleResultMap = {};
  const failures: unknown[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') {
      settled[outcome.value.role] = outcome.value;
    } else {
      failures.push(outcome.reason);
    }
  }
  if (failures.length === 0) return settled;

  ensureActive(ctx);
  log.warn(
    {
      queryId: ctx.query.id,
      errors: failures.map((error) => (error instanceof Error ? error.message : String(error))),
      settledRoles: Object.keys(settled),
    },
    'Full orchestration batch failed; falling back to hierarchical execution',
  );
  return runHierarchicalFrom(tasks, ctx, settled);
};

export const STRATEGY_RUNNERS: Record<ExecutionStrategy, StrategyRunner> = {
  sequential: runSequential,
  parallel: runParallel,
  hierarchical: runHierarchical,
  full_orchestration: runFullOrchestration,
};

/**
 * Execute the distributed tasks under the plan's strategy.
 *
 * @returns One result per task role.
 * @throws The Master role's failure, or QueryCancelledError when cancelled between phases.
 */
export async function executeTasks(
  strategy: ExecutionStrategy,
  tasks: RoleTask[],
  ctx: RoleExecutionContext,
): Promise<RoleResultMap> {
  ensureActive(ctx);
  log.info({ queryId: ctx.query.id, strategy, roles: tasks.map((task) => task.role) }, 'Executing role tasks');
  return STRATEGY_RUNNERS[strategy](tasks, ctx);
}
