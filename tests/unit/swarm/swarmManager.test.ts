import { describe, expect, it, vi } from 'vitest';
import { PlanningError } from '../../../src/core/swarm/swarmErrors';
import { SwarmManager } from '../../../src/core/swarm/swarmManager';
import { buildRoleConfigs } from '../../../src/core/swarm/roleConfig';
import { makeOutput, testRoleEnv } from './fixtures';

function managerWith(processQuery = vi.fn().mockResolvedValue(makeOutput({ confidence: 0.8 }))) {
  const factory = vi.fn(() => ({ processQuery }));
  const manager = SwarmManager.create({
    capabilities: { master: factory, search: factory, innovation: factory, analysis: factory },
    roleConfigs: buildRoleConfigs(testRoleEnv),
  });
  return { manager, factory, processQuery };
}

describe('SwarmManager.ask', () => {
  it('builds a query with defaults and runs it', async () => {
    const { manager } = managerWith();

    const result = await manager.ask('How do superconductors expel magnetic fields?', {
      complexity: 'basic',
      context: 'Type I materials only.',
    });

    expect(result.status).toBe('completed');
    expect(result.query).toMatchObject({
      question: 'How do superconductors expel magnetic fields?',
      context: 'Type I materials only.',
      complexity: 'basic',
      requiredConfidence: 'medium',
      timeLimitSec: 180,
    });
    expect(manager.record(result.queryId)?.status).toBe('completed');
  });

  it('initialises the roles once across calls', async () => {
    const { manager, factory } = managerWith();

    await manager.ask('How do superconductors expel magnetic fields?', { complexity: 'basic' });
    await manager.ask('Why do superconductors need low temperatures?', { complexity: 'intermediate' });

    expect(factory).toHaveBeenCalledTimes(4);
    expect(manager.status().totalProcessed).toBe(2);
  });

  it('rejects a question that cannot form a query', async () => {
    const { manager, processQuery } = managerWith();

    await expect(manager.ask('Why?')).rejects.toBeInstanceOf(PlanningError);
    expect(processQuery).not.toHaveBeenCalled();
  });

  it('forwards lifecycle events to listeners', async () => {
    const { manager } = managerWith();
    const listener = vi.fn();
    manager.onEvent(listener);

    await manager.ask('How do superconductors expel magnetic fields?', { complexity: 'basic' });

    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ type: 'query_finished', status: 'completed' }));
  });

  it('stops the orchestrator', async () => {
    const { manager } = managerWith();
    await manager.start();

    await manager.stop();
    const result = await manager.ask('How do superconductors expel magnetic fields?');

    expect(result.status).toBe('cancelled');
    expect(manager.cancel(result.queryId)).toBe(false);
  });
});
