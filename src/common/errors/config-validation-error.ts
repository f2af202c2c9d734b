import { SystemError } from './system-error';

/**
 * Thrown when journal configuration validation fails at startup.
 * Code 4010, SystemHealth range (4000-4999).
 * Severity: critical.
 */
export class ConfigValidationError extends SystemError {
  constructor(
    message: string,
    public readonly validationErrors: string[],
  ) {
    super(4010, message, 'critical', { validationErrors });
  }
}
