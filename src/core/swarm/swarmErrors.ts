import { AppError } from '../../shared/errors/app-error';
import { Role } from './swarm-types';

export class PlanningError extends AppError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super('PLANNING_FAILED', message, cause, details);
    this.name = 'PlanningError';
  }
}

/** A role collaborator is missing or could not be initialised. Fatal only for Master. */
export class RoleUnavailableError extends AppError {
  constructor(
    public readonly role: Role,
    message: string,
    cause?: unknown,
  ) {
    super('ROLE_UNAVAILABLE', message, cause, { role });
    this.name = 'RoleUnavailableError';
  }
}

export class RoleTimeoutError extends AppError {
  constructor(
    public readonly role: Role,
    public readonly timeoutMs: number,
  ) {
    super('ROLE_TIMEOUT', `Role "${role}" timed out after ${timeoutMs}ms`, undefined, { role, timeoutMs });
    this.name = 'RoleTimeoutError';
  }
}

export class RoleExecutionError extends AppError {
  constructor(
    public readonly role: Role,
    message: string,
    cause?: unknown,
  ) {
    super('ROLE_EXECUTION_FAILED', message, cause, { role });
    this.name = 'RoleExecutionError';
  }
}

export class SynthesisError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SYNTHESIS_FAILED', message, undefined, details);
    this.name = 'SynthesisError';
  }
}

export type RoleFailure = RoleUnavailableError | RoleTimeoutError | RoleExecutionError;

export function isRoleFailure(error: unknown): error is RoleFailure {
  return (
    error instanceof RoleUnavailableError ||
    error instanceof RoleTimeoutError ||
    error instanceof RoleExecutionError
  );
}

/** Normalise anything a collaborator throws into a role failure, keeping typed failures as they are. */
export function toRoleFailure(role: Role, error: unknown): RoleFailure {
  if (isRoleFailure(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new RoleExecutionError(role, message, error);
}
