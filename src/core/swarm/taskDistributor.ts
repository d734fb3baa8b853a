import { ExecutionPlan, Query, Role, RoleTask } from './swarm-types';

export const ROLE_PRIORITY: Record<Role, number> = {
  master: 1,
  search: 2,
  innovation: 3,
  analysis: 4,
};

function hintsForRole(role: Role, query: Query, plan: ExecutionPlan): Record<string, unknown> {
  switch (role) {
    case 'master':
      return {
        type: 'orchestration',
        queryType: plan.queryType,
        strategy: plan.strategy,
        requiredRoles: [...plan.requiredRoles],
        complexityFactors: [...plan.complexityFactors],
        context: query.context,
      };
    case 'search':
      return { type: 'research', focus: 'academic_sources' };
    case 'innovation':
      return { type: 'innovation', approach: 'first_principles' };
    case 'analysis':
      return { type: 'analysis', depth: 'critical_inquiry' };
  }
}

/** One immutable task per required role, in ascending priority. */
export function distributeTasks(query: Query, plan: ExecutionPlan): RoleTask[] {
  return [...plan.requiredRoles]
    .sort((a, b) => ROLE_PRIORITY[a] - ROLE_PRIORITY[b])
    .map((role) =>
      Object.freeze({
        role,
        priority: ROLE_PRIORITY[role],
        hints: Object.freeze(hintsForRole(role, query, plan)),
      }),
    );
}
