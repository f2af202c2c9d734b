import { SystemError } from './system-error';

export const JOURNAL_ERROR_CODES = {
  VALIDATION_FAILED: 2001,
  LIVE_MODE_DISABLED: 2002,
  TRADE_NOT_FOUND: 2101,
  DUPLICATE_OPEN_TRADE: 2201,
} as const;

/**
 * Caller-facing journal errors. Each carries the HTTP status the error
 * filter answers with, so controllers never translate them by hand.
 */
export abstract class JournalError extends SystemError {
  constructor(
    code: number,
    message: string,
    public readonly httpStatus: number,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, 'warning', metadata);
  }
}

/** Malformed or out-of-bounds input. */
export class ValidationError extends JournalError {
  constructor(
    message: string,
    public readonly violations: string[] = [message],
    code: number = JOURNAL_ERROR_CODES.VALIDATION_FAILED,
  ) {
    super(code, message, 400, { violations });
  }
}

/** The referenced trade does not exist, is not the caller's, or is not OPEN. */
export class NotFoundError extends JournalError {
  constructor(
    message: string,
    public readonly resourceId: string,
  ) {
    super(JOURNAL_ERROR_CODES.TRADE_NOT_FOUND, message, 404, { resourceId });
  }
}

/** An open-position policy conflict. */
export class DuplicateError extends JournalError {
  constructor(
    message: string,
    public readonly conflictingId: string,
  ) {
    super(JOURNAL_ERROR_CODES.DUPLICATE_OPEN_TRADE, message, 409, {
      conflictingId,
    });
  }
}
