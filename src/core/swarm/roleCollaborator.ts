import { z } from 'zod';
import { childLogger } from '../../shared/logging/logger';
import { RoleConfig } from './roleConfig';
import { RoleUnavailableError } from './swarmErrors';
import { Query, Role, RoleResultMap, ROLES } from './swarm-types';

/** Task hints handed to a collaborator, plus read-only peer results where the strategy provides them. */
export interface RoleInvocationHints {
  readonly priority: number;
  readonly hints: Readonly<Record<string, unknown>>;
  readonly peerResults: Readonly<RoleResultMap>;
}

const sourceKindSchema = z.enum([
  'peer_reviewed',
  'preprint',
  'experimental',
  'theoretical',
  'government',
  'educational',
  'news',
  'book',
  'conference',
]);

export const collaboratorOutputSchema = z.object({
  content: z.string(),
  confidence: z.number(),
  sources: z
    .array(
      z.object({
        url: z.string().min(1),
        title: z.string().default(''),
        kind: sourceKindSchema.default('educational'),
        credibility: z.number(),
        relevance: z.number().default(0),
      }),
    )
    .default([]),
  reasoning: z.string().default(''),
  questionsRaised: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
  processingMs: z.number().nonnegative().optional(),
});

export type CollaboratorOutput = z.input<typeof collaboratorOutputSchema>;

/**
 * Capability every role implementation provides. How content is produced is up to the
 * implementation; the swarm only relies on this shape.
 */
export interface RoleCollaborator {
  initialize?(): Promise<void>;
  processQuery(query: Query, hints: RoleInvocationHints): Promise<CollaboratorOutput>;
  cleanup?(): Promise<void>;
}

export type RoleCollaboratorFactory = (config: RoleConfig) => RoleCollaborator;

export type RoleCapabilityTable = Partial<Record<Role, RoleCollaboratorFactory>>;

export type RoleAvailability = 'ready' | 'unavailable' | 'not_configured';

export interface RoleStatus {
  availability: RoleAvailability;
  model: string;
  lastError: string | null;
}

interface RoleEntry {
  collaborator: RoleCollaborator | null;
  availability: RoleAvailability;
  lastError: string | null;
}

const log = childLogger({ component: 'role-registry' });

/**
 * Builds and initialises one collaborator per role from the capability table and tracks
 * which roles are usable.
 */
export class RoleRegistry {
  private readonly entries = new Map<Role, RoleEntry>();
  private readonly pending = new Map<Role, Promise<RoleCollaborator>>();

  constructor(
    private readonly capabilities: RoleCapabilityTable,
    private readonly configs: Record<Role, RoleConfig>,
  ) {
    for (const role of ROLES) {
      this.entries.set(role, {
        collaborator: null,
        availability: capabilities[role] ? 'unavailable' : 'not_configured',
        lastError: null,
      });
    }
  }

  isReady(role: Role): boolean {
    return this.entries.get(role)?.availability === 'ready';
  }

  /**
   * Construct and initialise the collaborator for a role. Idempotent once the role is ready;
   * concurrent callers share one in-flight attempt.
   *
   * @throws RoleUnavailableError when the role has no factory or construction/initialisation fails.
   */
  initializeRole(role: Role): Promise<RoleCollaborator> {
    const entry = this.entries.get(role);
    if (entry?.collaborator && entry.availability === 'ready') {
      return Promise.resolve(entry.collaborator);
    }
    const inFlight = this.pending.get(role);
    if (inFlight) return inFlight;

    const attempt = this.buildRole(role).finally(() => {
      this.pending.delete(role);
    });
    this.pending.set(role, attempt);
    return attempt;
  }

  private async buildRole(role: Role): Promise<RoleCollaborator> {
    const factory = this.capabilities[role];
    if (!factory) {
      throw new RoleUnavailableError(role, `No collaborator configured for role "${role}"`);
    }

    try {
      const collaborator = factory(this.configs[role]);
      await collaborator.initialize?.();
      this.entries.set(role, { collaborator, availability: 'ready', lastError: null });
      log.debug({ role, model: this.configs[role].model }, 'Role collaborator initialised');
      return collaborator;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.entries.set(role, { collaborator: null, availability: 'unavailable', lastError: message });
      log.warn({ role, error: message }, 'Role collaborator failed to initialise');
      throw new RoleUnavailableError(role, `Role "${role}" could not be initialised: ${message}`, error);
    }
  }

  /**
   * Initialise every configured role. Failures are recorded, not raised; callers decide
   * which roles they cannot do without.
   */
  async initializeAll(): Promise<Partial<Record<Role, RoleUnavailableError>>> {
    const failures: Partial<Record<Role, RoleUnavailableError>> = {};
    for (const role of ROLES) {
      if (!this.capabilities[role] || this.isReady(role)) continue;
      try {
        await this.initializeRole(role);
      } catch (error) {
        if (error instanceof RoleUnavailableError) {
          failures[role] = error;
        } else {
          throw error;
        }
      }
    }
    return failures;
  }

  /** Ready collaborators only; unavailable roles are absent and degrade at execution time. */
  readyCollaborators(): Partial<Record<Role, RoleCollaborator>> {
    const ready: Partial<Record<Role, RoleCollaborator>> = {};
    for (const [role, entry] of this.entries) {
      if (entry.availability === 'ready' && entry.collaborator) {
        ready[role] = entry.collaborator;
      }
    }
    return ready;
  }

  status(): Record<Role, RoleStatus> {
    const statusOf = (role: Role): RoleStatus => {
      const entry = this.entries.get(role);
      return {
        availability: entry?.availability ?? 'not_configured',
        model: this.configs[role].model,
        lastError: entry?.lastError ?? null,
      };
    };
    return {
      master: statusOf('master'),
      search: statusOf('search'),
      innovation: statusOf('innovation'),
      analysis: statusOf('analysis'),
    };
  }

  async cleanupAll(): Promise<void> {
    for (const [role, entry] of this.entries) {
      if (!entry.collaborator?.cleanup) continue;
      try {
        await entry.collaborator.cleanup();
      } catch (error) {
        log.warn({ role, error }, 'Role collaborator cleanup failed');
      }
    }
  }
}
