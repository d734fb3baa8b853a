import { childLogger } from '../../shared/logging/logger';
import { ConfidenceLevel, QueryStatus, Role } from './swarm-types';

const log = childLogger({ component: 'swarm-events' });

export type SwarmEventType = 'query_queued' | 'state_changed' | 'role_completed' | 'query_finished';

export interface SwarmEvent {
  id: string;
  queryId: string;
  type: SwarmEventType;
  timestamp: string;
  status?: QueryStatus;
  previousStatus?: QueryStatus;
  role?: Role;
  confidence?: ConfidenceLevel;
  details?: Record<string, unknown>;
}

export type SwarmEventListener = (event: SwarmEvent) => void;

export interface SwarmEventFactory {
  nextEvent(params: Omit<SwarmEvent, 'id' | 'queryId' | 'timestamp'>): SwarmEvent;
}

export function createSwarmEventFactory(queryId: string): SwarmEventFactory {
  let counter = 0;
  return {
    nextEvent(params: Omit<SwarmEvent, 'id' | 'queryId' | 'timestamp'>): SwarmEvent {
      counter += 1;
      return {
        ...params,
        id: `${queryId}:${counter}`,
        queryId,
        timestamp: new Date().toISOString(),
      };
    },
  };
}

/** Synchronous fan-out to listeners. A throwing listener is logged and the rest still run. */
export class SwarmEventBus {
  private readonly listeners = new Set<SwarmEventListener>();

  subscribe(listener: SwarmEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: SwarmEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.warn({ error, eventType: event.type, queryId: event.queryId }, 'Swarm event listener threw');
      }
    }
  }
}
