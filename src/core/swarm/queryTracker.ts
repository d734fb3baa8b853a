import { AppError } from '../../shared/errors/app-error';
import {
  ComplexityLevel,
  ConfidenceLevel,
  ExecutionPlan,
  QueryStatus,
  Role,
  TerminalStatus,
} from './swarm-types';

export interface QueryMetrics {
  complexity: ComplexityLevel;
  durationMs: number;
  rolesUsed: Role[];
  sourcesFound: number;
  confidence: ConfidenceLevel;
}

export interface QueryRecord {
  queryId: string;
  startedAt: string;
  status: QueryStatus;
  plan: ExecutionPlan | null;
  history: Array<{ status: QueryStatus; at: string }>;
  finishedAt: string | null;
  durationMs: number | null;
  metrics: QueryMetrics | null;
  error: { code: string; message: string } | null;
}

const TERMINAL_STATUSES: readonly QueryStatus[] = ['completed', 'failed', 'cancelled'];

// Any non-terminal state may also fail on an unexpected internal error or be cancelled.
const FORWARD_TRANSITIONS: Record<QueryStatus, readonly QueryStatus[]> = {
  queued: ['planning'],
  planning: ['distributing'],
  distributing: ['executing'],
  executing: ['synthesizing'],
  synthesizing: ['validating'],
  validating: ['completed'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminalStatus(status: QueryStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: QueryStatus, to: QueryStatus): boolean {
  if (isTerminalStatus(from)) return false;
  if (to === 'failed' || to === 'cancelled') return true;
  return FORWARD_TRANSITIONS[from].includes(to);
}

/**
 * Per-query lifecycle store owned by one orchestrator. Records are kept after a query
 * finishes so status and metrics stay queryable.
 */
export class QueryTracker {
  private readonly records = new Map<string, QueryRecord>();

  /**
   * @throws AppError `INVALID_STATE_TRANSITION` when the id is already tracked.
   */
  register(queryId: string, startedAt: Date = new Date()): QueryRecord {
    if (this.records.has(queryId)) {
      throw new AppError('INVALID_STATE_TRANSITION', `Query "${queryId}" is already tracked`, undefined, {
        queryId,
      });
    }
    const at = startedAt.toISOString();
    const record: QueryRecord = {
      queryId,
      startedAt: at,
      status: 'queued',
      plan: null,
      history: [{ status: 'queued', at }],
      finishedAt: null,
      durationMs: null,
      metrics: null,
      error: null,
    };
    this.records.set(queryId, record);
    return record;
  }

  /**
   * Move a query to its next state.
   *
   * @returns The state the query was in before.
   * @throws AppError `INVALID_STATE_TRANSITION` for an unknown id or an illegal move.
   */
  transition(queryId: string, next: QueryStatus): QueryStatus {
    const record = this.require(queryId);
    const previous = record.status;
    if (!canTransition(previous, next)) {
      throw new AppError('INVALID_STATE_TRANSITION', `Illegal transition ${previous} -> ${next}`, undefined, {
        queryId,
        from: previous,
        to: next,
      });
    }
    record.status = next;
    record.history.push({ status: next, at: new Date().toISOString() });
    return previous;
  }

  attachPlan(queryId: string, plan: ExecutionPlan): void {
    this.require(queryId).plan = plan;
  }

  finish(
    queryId: string,
    params: { durationMs: number; metrics?: QueryMetrics; error?: { code: string; message: string } },
  ): void {
    const record = this.require(queryId);
    record.finishedAt = new Date().toISOString();
    record.durationMs = params.durationMs;
    record.metrics = params.metrics ?? null;
    record.error = params.error ?? null;
  }

  status(queryId: string): QueryStatus | undefined {
    return this.records.get(queryId)?.status;
  }

  get(queryId: string): QueryRecord | undefined {
    const record = this.records.get(queryId);
    if (!record) return undefined;
    return {
      ...record,
      history: record.history.map((entry) => ({ ...entry })),
      metrics: record.metrics ? { ...record.metrics, rolesUsed: [...record.metrics.rolesUsed] } : null,
      error: record.error ? { ...record.error } : null,
    };
  }

  activeIds(): string[] {
    return [...this.records.values()]
      .filter((record) => !isTerminalStatus(record.status))
      .map((record) => record.queryId);
  }

  activeCount(): number {
    return this.activeIds().length;
  }

  /** Completed queries; only those carry performance metrics. */
  totalProcessed(): number {
    let count = 0;
    for (const record of this.records.values()) {
      if (record.metrics) count += 1;
    }
    return count;
  }

  averageProcessingMs(): number {
    let total = 0;
    let count = 0;
    for (const record of this.records.values()) {
      if (!record.metrics) continue;
      total += record.metrics.durationMs;
      count += 1;
    }
    return count === 0 ? 0 : Math.round(total / count);
  }

  private require(queryId: string): QueryRecord {
    const record = this.records.get(queryId);
    if (!record) {
      throw new AppError('INVALID_STATE_TRANSITION', `Query "${queryId}" is not tracked`, undefined, { queryId });
    }
    return record;
  }
}
