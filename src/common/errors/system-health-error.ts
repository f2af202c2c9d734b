import { ErrorSeverity, SystemError } from './system-error';

/**
 * System health errors (codes 4000-4999)
 * Used for infrastructure failures such as an unreachable database.
 */
export class SystemHealthError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: ErrorSeverity,
    public readonly component?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, metadata);
  }
}

export const SYSTEM_HEALTH_ERROR_CODES = {
  /** Database reachable but query failed (critical) */
  DATABASE_QUERY_FAILED: 4001,
  /** Database connectivity failure (critical) */
  DATABASE_FAILURE: 4002,
} as const;
