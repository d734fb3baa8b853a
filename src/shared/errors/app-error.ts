export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'TIMEOUT'
  | 'PLANNING_FAILED'
  | 'ROLE_UNAVAILABLE'
  | 'ROLE_TIMEOUT'
  | 'ROLE_EXECUTION_FAILED'
  | 'SYNTHESIS_FAILED'
  | 'QUERY_CANCELLED'
  | 'INVALID_STATE_TRANSITION'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function toErrorWithCode(error: unknown, fallbackCode: ErrorCode): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error) return new AppError(fallbackCode, error.message, error);
  return new AppError(fallbackCode, String(error));
}
