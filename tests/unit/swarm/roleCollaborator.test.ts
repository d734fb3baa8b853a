import { describe, expect, it, vi } from 'vitest';
import { RoleCollaborator, RoleRegistry } from '../../../src/core/swarm/roleCollaborator';
import { buildRoleConfigs } from '../../../src/core/swarm/roleConfig';
import { RoleUnavailableError } from '../../../src/core/swarm/swarmErrors';
import { makeOutput, testRoleEnv } from './fixtures';

function collaborator(overrides: Partial<RoleCollaborator> = {}): RoleCollaborator {
  return { processQuery: vi.fn().mockResolvedValue(makeOutput()), ...overrides };
}

describe('RoleRegistry', () => {
  const configs = buildRoleConfigs(testRoleEnv);

  it('records initialisation failures without raising them', async () => {
    const registry = new RoleRegistry(
      {
        master: () => collaborator(),
        search: () => collaborator({ initialize: vi.fn().mockRejectedValue(new Error('no credentials')) }),
      },
      configs,
    );

    const failures = await registry.initializeAll();

    expect(Object.keys(failures)).toEqual(['search']);
    expect(failures.search).toBeInstanceOf(RoleUnavailableError);
    expect(failures.search?.message).toBe('Role "search" could not be initialised: no credentials');
    expect(registry.status()).toEqual({
      master: { availability: 'ready', model: 'test-model', lastError: null },
      search: { availability: 'unavailable', model: 'test-model', lastError: 'no credentials' },
      innovation: { availability: 'not_configured', model: 'test-model', lastError: null },
      analysis: { availability: 'not_configured', model: 'test-model', lastError: null },
    });
    expect(Object.keys(registry.readyCollaborators())).toEqual(['master']);
  });

  it('builds a ready collaborator only once', async () => {
    const factory = vi.fn(() => collaborator());
    const registry = new RoleRegistry({ master: factory }, configs);

    const first = await registry.initializeRole('master');
    const second = await registry.initializeRole('master');

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledWith(configs.master);
    expect(registry.isReady('master')).toBe(true);
  });

  it('shares an in-flight initialisation between concurrent callers', async () => {
    const factory = vi.fn(() => collaborator({ initialize: vi.fn().mockResolvedValue(undefined) }));
    const registry = new RoleRegistry({ master: factory }, configs);

    const [first, second] = await Promise.all([registry.initializeRole('master'), registry.initializeRole('master')]);

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('starts a fresh attempt after a failed one settles', async () => {
    const initialize = vi.fn().mockRejectedValueOnce(new Error('cold start')).mockResolvedValue(undefined);
    const factory = vi.fn(() => collaborator({ initialize }));
    const registry = new RoleRegistry({ master: factory }, configs);

    await expect(registry.initializeRole('master')).rejects.toBeInstanceOf(RoleUnavailableError);
    await expect(registry.initializeRole('master')).resolves.toBeDefined();

    expect(factory).toHaveBeenCalledTimes(2);
    expect(registry.isReady('master')).toBe(true);
  });

  it('rejects a role with no factory', async () => {
    const registry = new RoleRegistry({}, configs);

    await expect(registry.initializeRole('analysis')).rejects.toThrow(
      'No collaborator configured for role "analysis"',
    );
  });

  it('cleans up every collaborator even when one cleanup fails', async () => {
    const failingCleanup = vi.fn().mockRejectedValue(new Error('socket closed'));
    const cleanup = vi.fn().mockResolvedValue(undefined);
    const registry = new RoleRegistry(
      {
        master: () => collaborator({ cleanup: failingCleanup }),
        search: () => collaborator({ cleanup }),
      },
      configs,
    );
    await registry.initializeAll();

    await expect(registry.cleanupAll()).resolves.toBeUndefined();
    expect(failingCleanup).toHaveBeenCalledTimes(1);
    expect(cleanup).toHaveBeenCalledTimes(1);
  });
});
