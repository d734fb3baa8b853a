import { childLogger } from '../../shared/logging/logger';
import { createQuery, QueryInput } from './query';
import { QueryRecord } from './queryTracker';
import { SwarmEventListener } from './swarm-events';
import { SwarmOrchestrator, SwarmOrchestratorOptions, SwarmStatus } from './swarmOrchestrator';
import { SwarmResult } from './swarm-types';

const log = childLogger({ component: 'swarm-manager' });

export type AskOptions = Omit<QueryInput, 'question'>;

/**
 * Entry point for callers that hold a question rather than a built Query.
 */
export class SwarmManager {
  private started: Promise<void> | null = null;

  constructor(private readonly orchestrator: SwarmOrchestrator) {}

  static create(opts: SwarmOrchestratorOptions): SwarmManager {
    return new SwarmManager(new SwarmOrchestrator(opts));
  }

  start(): Promise<void> {
    if (!this.started) {
      this.started = this.orchestrator.initialize().then((failures) => {
        log.info({ unavailableRoles: Object.keys(failures) }, 'Swarm manager started');
      });
    }
    return this.started;
  }

  /**
   * Build a Query with defaults and run it.
   *
   * @throws PlanningError when the question or options do not form a valid query.
   */
  async ask(question: string, opts: AskOptions = {}): Promise<SwarmResult> {
    const query = createQuery({ ...opts, question });
    await this.start();
    return this.orchestrator.submitQuery(query);
  }

  cancel(queryId: string): boolean {
    return this.orchestrator.cancelQuery(queryId);
  }

  status(): SwarmStatus {
    return this.orchestrator.getStatus();
  }

  record(queryId: string): QueryRecord | undefined {
    return this.orchestrator.getQueryRecord(queryId);
  }

  onEvent(listener: SwarmEventListener): () => void {
    return this.orchestrator.onEvent(listener);
  }

  async stop(): Promise<void> {
    await this.orchestrator.shutdown();
  }
}
