export type ErrorSeverity = 'critical' | 'error' | 'warning';

/**
 * Base error class for all system errors.
 * Subclasses define error code ranges:
 * - JournalError (ValidationError, NotFoundError, DuplicateError): 2000-2999
 * - SystemHealthError / ConfigValidationError: 4000-4999
 */
export abstract class SystemError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: ErrorSeverity,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}
