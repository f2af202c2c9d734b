export { SystemError } from './system-error';
export type { ErrorSeverity } from './system-error';
export {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './system-health-error';
export { ConfigValidationError } from './config-validation-error';
export {
  JournalError,
  ValidationError,
  NotFoundError,
  DuplicateError,
  JOURNAL_ERROR_CODES,
} from './journal-error';
