import { Injectable, ValidationPipe } from '@nestjs/common';
import type { ValidationError as ClassValidatorError } from 'class-validator';
import { ValidationError } from '../errors/journal-error';

function collectConstraints(errors: ClassValidatorError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectConstraints(error.children ?? []),
  ]);
}

/**
 * Whitelisting, transforming ValidationPipe whose failures surface as the
 * journal's ValidationError, so request-shape problems share the error
 * envelope with domain validation.
 */
@Injectable()
export class JournalValidationPipe extends ValidationPipe {
  constructor() {
    super({
      whitelist: true,
      transform: true,
      exceptionFactory: (errors: ClassValidatorError[]) => {
        const violations = collectConstraints(errors);
        if (violations.length === 0) {
          return new ValidationError('Invalid request payload');
        }
        return new ValidationError(violations.join('; '), violations);
      },
    });
  }
}
