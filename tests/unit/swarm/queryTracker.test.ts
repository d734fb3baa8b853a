import { describe, expect, it } from 'vitest';
import { canTransition, QueryMetrics, QueryTracker } from '../../../src/core/swarm/queryTracker';

function metricsFor(durationMs: number): QueryMetrics {
  return { complexity: 'basic', durationMs, rolesUsed: ['master'], sourcesFound: 1, confidence: 'medium' };
}

describe('canTransition', () => {
  it('allows the forward chain plus failure and cancellation from live states', () => {
    expect(canTransition('queued', 'planning')).toBe(true);
    expect(canTransition('validating', 'completed')).toBe(true);
    expect(canTransition('executing', 'failed')).toBe(true);
    expect(canTransition('distributing', 'cancelled')).toBe(true);
    expect(canTransition('queued', 'executing')).toBe(false);
    expect(canTransition('completed', 'failed')).toBe(false);
    expect(canTransition('cancelled', 'planning')).toBe(false);
  });
});

describe('QueryTracker', () => {
  it('tracks a query through its states and keeps the history', () => {
    const tracker = new QueryTracker();
    tracker.register('q1', new Date('2026-01-01T00:00:00.000Z'));

    expect(tracker.transition('q1', 'planning')).toBe('queued');
    expect(tracker.transition('q1', 'distributing')).toBe('planning');

    const record = tracker.get('q1');
    expect(record?.startedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(record?.status).toBe('distributing');
    expect(record?.history.map((entry) => entry.status)).toEqual(['queued', 'planning', 'distributing']);
    expect(tracker.activeCount()).toBe(1);
  });

  it('rejects illegal moves and unknown ids', () => {
    const tracker = new QueryTracker();
    tracker.register('q1');

    expect(() => tracker.transition('q1', 'executing')).toThrow('Illegal transition queued -> executing');
    expect(() => tracker.transition('missing', 'planning')).toThrow('Query "missing" is not tracked');
    expect(() => tracker.register('q1')).toThrow('Query "q1" is already tracked');
  });

  it('refuses to leave a terminal state', () => {
    const tracker = new QueryTracker();
    tracker.register('q1');
    tracker.transition('q1', 'cancelled');

    expect(() => tracker.transition('q1', 'failed')).toThrow('Illegal transition cancelled -> failed');
    expect(tracker.activeCount()).toBe(0);
  });

  it('aggregates processing time over completed queries only', () => {
    const tracker = new QueryTracker();
    for (const id of ['q1', 'q2', 'q3', 'q4']) tracker.register(id);
    tracker.finish('q1', { durationMs: 100, metrics: metricsFor(100) });
    tracker.finish('q2', { durationMs: 201, error: { code: 'PLANNING_FAILED', message: 'bad' } });
    tracker.finish('q3', { durationMs: 303, metrics: metricsFor(303) });

    expect(tracker.totalProcessed()).toBe(2);
    expect(tracker.averageProcessingMs()).toBe(202);
    expect(tracker.get('q2')?.error).toEqual({ code: 'PLANNING_FAILED', message: 'bad' });
  });

  it('hands out copies of its records', () => {
    const tracker = new QueryTracker();
    tracker.register('q1');

    tracker.get('q1')?.history.push({ status: 'completed', at: 'later' });

    expect(tracker.get('q1')?.history).toHaveLength(1);
  });
});
